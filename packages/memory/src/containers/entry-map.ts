/**
 * Cursor-Addressed Map Base
 *
 * Shared surface of the in-memory maps: entries are `readonly [key, value]`
 * tuples in a linked list, and subclasses only decide where a key lives.
 */

import type { KeyedStorage, SizedStorage } from "@graphdesc/descriptors"
import { END, LinkedList, ListCursor, type LinkNode } from "./linked-list"

export type MapEntry<K, V> = readonly [K, V]

export abstract class EntryMap<K, V> implements KeyedStorage<K, MapEntry<K, V>>, SizedStorage, Iterable<MapEntry<K, V>> {
  protected readonly list = new LinkedList<MapEntry<K, V>>()

  /** Name used in error messages. */
  protected abstract readonly label: string

  /** Node holding `key`, if any. */
  protected abstract lookup(key: K): LinkNode<MapEntry<K, V>> | undefined

  /** Link a node for a key that is not present yet. */
  protected abstract insertNew(key: K, value: V): LinkNode<MapEntry<K, V>>

  protected abstract forget(key: K): void

  protected abstract forgetAll(): void

  get size(): number {
    return this.list.size
  }

  get(key: K): V | undefined {
    const node = this.lookup(key)
    if (!node || node.entry === END) return undefined
    return node.entry[1]
  }

  has(key: K): boolean {
    return this.lookup(key) !== undefined
  }

  /**
   * Insert or update. Updating keeps the entry's position, so cursors to it
   * stay valid.
   */
  set(key: K, value: V): this {
    const node = this.lookup(key)
    if (node) {
      node.entry = [key, value]
    } else {
      this.insertNew(key, value)
    }
    return this
  }

  delete(key: K): boolean {
    const node = this.lookup(key)
    if (!node) return false
    this.forget(key)
    this.list.unlink(node)
    return true
  }

  clear(): void {
    this.forgetAll()
    this.list.clear()
  }

  begin(): ListCursor<MapEntry<K, V>> {
    return this.list.cursor(this.list.sentinel.next, this.label)
  }

  end(): ListCursor<MapEntry<K, V>> {
    return this.list.cursor(this.list.sentinel, this.label)
  }

  /**
   * Cursor to the entry for `key`, or `end()` when the key is absent.
   */
  find(key: K): ListCursor<MapEntry<K, V>> {
    const node = this.lookup(key)
    return node ? this.list.cursor(node, this.label) : this.end()
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.list) yield key
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.list) yield value
  }

  *entries(): IterableIterator<MapEntry<K, V>> {
    yield* this.list
  }

  [Symbol.iterator](): IterableIterator<MapEntry<K, V>> {
    return this.entries()
  }
}
