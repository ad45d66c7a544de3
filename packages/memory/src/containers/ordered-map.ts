/**
 * Ordered Map
 */

import { DescriptorError } from "@graphdesc/descriptors"
import { EntryMap, type MapEntry } from "./entry-map"
import { END, type LinkNode } from "./linked-list"

export type KeyComparator<K> = (a: K, b: K) => number

export interface OrderedMapOptions<K> {
  /** Key order. Defaults to the natural order of numbers, strings and bigints. */
  compare?: KeyComparator<K>
}

/**
 * Natural order of numbers, strings and bigints.
 * @throws DescriptorError for keys of any other type, or of mixed types
 */
export function naturalOrder(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a < b ? -1 : a > b ? 1 : 0
  if (typeof a === "string" && typeof b === "string") return a < b ? -1 : a > b ? 1 : 0
  if (typeof a === "bigint" && typeof b === "bigint") return a < b ? -1 : a > b ? 1 : 0
  throw new DescriptorError(`Cannot order ${typeof a} and ${typeof b} keys without a compare option`)
}

/**
 * Map keeping its keys sorted. Cursors walk the keys in ascending order.
 *
 * @example
 * ```typescript
 * const g = new OrderedMap<number, number[]>([[200, [100]], [100, [200]]])
 * for (const u of vertices(g)) u.vertexId() // 100, 200
 * ```
 */
export class OrderedMap<K, V> extends EntryMap<K, V> {
  protected readonly label = "OrderedMap"
  private readonly compare: KeyComparator<K>
  // Nodes sorted by key, for binary search
  private readonly nodes: LinkNode<MapEntry<K, V>>[] = []

  constructor(entries?: Iterable<readonly [K, V]>, options: OrderedMapOptions<K> = {}) {
    super()
    this.compare = options.compare ?? naturalOrder
    if (entries) {
      for (const [key, value] of entries) this.set(key, value)
    }
  }

  /** Index of the first node whose key is not less than `key`. */
  private lowerBound(key: K): number {
    let low = 0
    let high = this.nodes.length
    while (low < high) {
      const mid = (low + high) >>> 1
      if (this.compare(this.keyAt(mid), key) < 0) low = mid + 1
      else high = mid
    }
    return low
  }

  private keyAt(index: number): K {
    const entry = this.nodes[index].entry
    if (entry === END) {
      throw new DescriptorError("OrderedMap index holds the end position")
    }
    return entry[0]
  }

  protected lookup(key: K): LinkNode<MapEntry<K, V>> | undefined {
    const index = this.lowerBound(key)
    if (index < this.nodes.length && this.compare(this.keyAt(index), key) === 0) {
      return this.nodes[index]
    }
    return undefined
  }

  protected insertNew(key: K, value: V): LinkNode<MapEntry<K, V>> {
    const index = this.lowerBound(key)
    const before = index < this.nodes.length ? this.nodes[index] : this.list.sentinel
    const node = this.list.insertBefore(before, [key, value])
    this.nodes.splice(index, 0, node)
    return node
  }

  protected forget(key: K): void {
    this.nodes.splice(this.lowerBound(key), 1)
  }

  protected forgetAll(): void {
    this.nodes.length = 0
  }
}
