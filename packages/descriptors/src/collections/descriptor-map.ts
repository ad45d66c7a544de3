/**
 * Descriptor-Keyed Map
 *
 * `Map` compares keys by reference, but descriptors are values: two
 * descriptors built independently for the same vertex must find the same
 * entry. Entries are bucketed by `hash()` and matched with `equals()`.
 */

import type { Hashable } from '../descriptor'

interface Entry<D, V> {
  readonly key: D
  value: V
}

export class DescriptorMap<D extends Hashable<D>, V> implements Iterable<[D, V]> {
  private readonly buckets = new Map<number, Entry<D, V>[]>()
  // Insertion order across buckets. Deleted entries are removed eagerly.
  private readonly order: Entry<D, V>[] = []

  constructor(entries?: Iterable<readonly [D, V]>) {
    if (entries) {
      for (const [key, value] of entries) this.set(key, value)
    }
  }

  get size(): number {
    return this.order.length
  }

  private lookup(key: D): Entry<D, V> | undefined {
    return this.buckets.get(key.hash())?.find((entry) => entry.key.equals(key))
  }

  get(key: D): V | undefined {
    return this.lookup(key)?.value
  }

  has(key: D): boolean {
    return this.lookup(key) !== undefined
  }

  set(key: D, value: V): this {
    const existing = this.lookup(key)
    if (existing) {
      existing.value = value
      return this
    }

    const entry: Entry<D, V> = { key, value }
    const hash = key.hash()
    const bucket = this.buckets.get(hash)
    if (bucket) bucket.push(entry)
    else this.buckets.set(hash, [entry])
    this.order.push(entry)
    return this
  }

  delete(key: D): boolean {
    const hash = key.hash()
    const bucket = this.buckets.get(hash)
    const index = bucket?.findIndex((entry) => entry.key.equals(key)) ?? -1
    if (!bucket || index < 0) return false

    const [entry] = bucket.splice(index, 1)
    if (bucket.length === 0) this.buckets.delete(hash)
    this.order.splice(this.order.indexOf(entry), 1)
    return true
  }

  clear(): void {
    this.buckets.clear()
    this.order.length = 0
  }

  *keys(): IterableIterator<D> {
    for (const entry of this.order) yield entry.key
  }

  *values(): IterableIterator<V> {
    for (const entry of this.order) yield entry.value
  }

  *entries(): IterableIterator<[D, V]> {
    for (const entry of this.order) yield [entry.key, entry.value]
  }

  forEach(callback: (value: V, key: D, map: this) => void): void {
    for (const entry of this.order) callback(entry.value, entry.key, this)
  }

  [Symbol.iterator](): IterableIterator<[D, V]> {
    return this.entries()
  }
}
