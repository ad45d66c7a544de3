/**
 * Vertex Views
 */

import { IndexedVertexDescriptor, PositionalVertexDescriptor } from '../descriptor'
import type { BidirectionalCursor, PairLike } from '../storage'
import { DescriptorView } from './base'
import { cursorStep, indexStep } from './cursor'

/**
 * Vertices `[first, last)` of random-access storage.
 */
export class IndexedVertexView<E> extends DescriptorView<number, IndexedVertexDescriptor<E>> {
  readonly kind = 'indexed' as const

  constructor(first: number, last: number) {
    super(first, last, indexStep)
  }

  protected describe(position: number): IndexedVertexDescriptor<E> {
    return new IndexedVertexDescriptor<E>(position)
  }

  /** Number of vertices in the view, in O(1). */
  size(): number {
    return this.last - this.first
  }
}

/**
 * Vertices between two cursors of `(key, value)` storage.
 *
 * There is deliberately no `size()`: counting would walk the range.
 */
export class PositionalVertexView<K, V> extends DescriptorView<
  BidirectionalCursor<PairLike<K, V>>,
  PositionalVertexDescriptor<K, V>
> {
  readonly kind = 'positional' as const

  constructor(first: BidirectionalCursor<PairLike<K, V>>, last: BidirectionalCursor<PairLike<K, V>>) {
    super(first, last, cursorStep<BidirectionalCursor<PairLike<K, V>>>())
  }

  protected describe(position: BidirectionalCursor<PairLike<K, V>>): PositionalVertexDescriptor<K, V> {
    return new PositionalVertexDescriptor(position)
  }
}

/** Any vertex view, with its type parameters erased. */
export type AnyVertexView = IndexedVertexView<unknown> | PositionalVertexView<unknown, unknown>
