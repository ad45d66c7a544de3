/**
 * Linked Hash Map
 */

import { EntryMap, type MapEntry } from "./entry-map"
import type { LinkNode } from "./linked-list"

/**
 * Hashed map iterating in insertion order. Keys compare like `Map` keys
 * (SameValueZero). Re-setting a key keeps its original position.
 */
export class LinkedHashMap<K, V> extends EntryMap<K, V> {
  protected readonly label = "LinkedHashMap"
  private readonly index = new Map<K, LinkNode<MapEntry<K, V>>>()

  constructor(entries?: Iterable<readonly [K, V]>) {
    super()
    if (entries) {
      for (const [key, value] of entries) this.set(key, value)
    }
  }

  protected lookup(key: K): LinkNode<MapEntry<K, V>> | undefined {
    return this.index.get(key)
  }

  protected insertNew(key: K, value: V): LinkNode<MapEntry<K, V>> {
    const node = this.list.append([key, value])
    this.index.set(key, node)
    return node
  }

  protected forget(key: K): void {
    this.index.delete(key)
  }

  protected forgetAll(): void {
    this.index.clear()
  }
}
