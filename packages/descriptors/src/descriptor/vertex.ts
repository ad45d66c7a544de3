/**
 * Vertex Descriptors
 *
 * Lightweight handles to vertices. An indexed descriptor stores the vertex's
 * offset; a positional descriptor stores a cursor to a `(key, value)` element.
 * Neither holds on to the container: accessors take it as an argument.
 */

import type {
  BidirectionalCursor,
  BidirectionalStorage,
  IndexedStorage,
  KeyValueObject,
  KeyValueTuple,
  PairLike,
} from '../storage'
import { hashValue } from '../utils'
import type { VertexDescriptor } from './types'

/**
 * Key (component 0) of a pair-like element.
 */
export function keyOf<K, V>(element: PairLike<K, V>): K {
  return 'first' in element ? element.first : element[0]
}

/**
 * Value (component 1) of a pair-like element.
 */
export function mappedValueOf<K, V>(element: PairLike<K, V>): V {
  return 'second' in element ? element.second : element[1]
}

// =============================================================================
// INDEXED
// =============================================================================

/**
 * Vertex of random-access storage. The id is the offset itself.
 */
export class IndexedVertexDescriptor<E> implements VertexDescriptor<number, number> {
  readonly kind = 'indexed' as const

  constructor(private readonly index: number = 0) {}

  value(): number {
    return this.index
  }

  vertexId(): number {
    return this.index
  }

  /** The element stored at this offset. */
  underlyingValue(container: IndexedStorage<E>): E {
    return container[this.index]
  }

  /** Same as `underlyingValue`: the whole element is the vertex data. */
  innerValue(container: IndexedStorage<E>): E {
    return container[this.index]
  }

  next(): IndexedVertexDescriptor<E> {
    return new IndexedVertexDescriptor<E>(this.index + 1)
  }

  equals(other: VertexDescriptor): boolean {
    return other instanceof IndexedVertexDescriptor && other.index === this.index
  }

  compare(other: IndexedVertexDescriptor<E>): number {
    return Math.sign(this.index - other.index)
  }

  hash(): number {
    return hashValue(this.index)
  }

  toString(): string {
    return `VertexDescriptor(${this.index})`
  }
}

// =============================================================================
// POSITIONAL
// =============================================================================

/**
 * Vertex of cursor-addressed storage whose elements are `(key, value)` pairs.
 * The id is the key found at the cursor.
 *
 * `vertexId`, `underlyingValue`, `innerValue` and `hash` dereference the
 * cursor, so they must not be called on a past-the-end descriptor.
 */
export class PositionalVertexDescriptor<K, V>
  implements VertexDescriptor<K, BidirectionalCursor<PairLike<K, V>>>
{
  readonly kind = 'positional' as const

  constructor(private readonly cursor: BidirectionalCursor<PairLike<K, V>>) {}

  value(): BidirectionalCursor<PairLike<K, V>> {
    return this.cursor
  }

  vertexId(): K {
    return keyOf(this.cursor.get())
  }

  /**
   * The whole `(key, value)` element. The container is implied by the cursor
   * and may be omitted.
   */
  underlyingValue(_container?: BidirectionalStorage<PairLike<K, V>>): PairLike<K, V> {
    return this.cursor.get()
  }

  /** The value half of the element, without the key. */
  innerValue(_container?: BidirectionalStorage<PairLike<K, V>>): V {
    return mappedValueOf(this.cursor.get())
  }

  next(): PositionalVertexDescriptor<K, V> {
    return new PositionalVertexDescriptor(this.cursor.next())
  }

  equals(other: VertexDescriptor): boolean {
    return other instanceof PositionalVertexDescriptor && this.cursor.equals(other.cursor)
  }

  /** Hash of the key, so independently built descriptors of one vertex agree. */
  hash(): number {
    return hashValue(this.vertexId())
  }

  toString(): string {
    return `VertexDescriptor(${String(this.vertexId())})`
  }
}

// =============================================================================
// TYPE-LEVEL SELECTION
// =============================================================================

/**
 * Descriptor class selected by the storage type.
 */
export type VertexDescriptorOf<S> =
  S extends IndexedStorage<infer E>
    ? IndexedVertexDescriptor<E>
    : S extends BidirectionalStorage<KeyValueTuple<infer K, infer V>>
      ? PositionalVertexDescriptor<K, V>
      : S extends BidirectionalStorage<KeyValueObject<infer K, infer V>>
        ? PositionalVertexDescriptor<K, V>
        : never
