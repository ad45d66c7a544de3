/**
 * Descriptor Set
 */

import type { Hashable } from '../descriptor'
import { DescriptorMap } from './descriptor-map'

/**
 * Set of descriptors compared by value. Iterates in insertion order.
 *
 * @example
 * ```typescript
 * const seen = new DescriptorSet<IndexedVertexDescriptor<string>>()
 * seen.add(new IndexedVertexDescriptor(1))
 * seen.has(new IndexedVertexDescriptor(1)) // true
 * ```
 */
export class DescriptorSet<D extends Hashable<D>> implements Iterable<D> {
  private readonly members = new DescriptorMap<D, true>()

  constructor(values?: Iterable<D>) {
    if (values) {
      for (const value of values) this.add(value)
    }
  }

  get size(): number {
    return this.members.size
  }

  add(value: D): this {
    this.members.set(value, true)
    return this
  }

  has(value: D): boolean {
    return this.members.has(value)
  }

  delete(value: D): boolean {
    return this.members.delete(value)
  }

  clear(): void {
    this.members.clear()
  }

  values(): IterableIterator<D> {
    return this.members.keys()
  }

  [Symbol.iterator](): IterableIterator<D> {
    return this.members.keys()
  }
}
