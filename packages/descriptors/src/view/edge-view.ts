/**
 * Edge Views
 *
 * Every descriptor an edge view yields shares the view's source vertex and
 * payload shape. Views can cover a whole per-vertex edge container
 * (adjacency lists) or an explicit sub-range of global edge storage
 * (compressed rows).
 */

import { IndexedEdgeDescriptor, PositionalEdgeDescriptor, type VertexDescriptor } from '../descriptor'
import type { PayloadShape } from '../shape'
import type { Cursor } from '../storage'
import { DescriptorView } from './base'
import { cursorStep, indexStep } from './cursor'

/**
 * Edges `[first, last)` of random-access storage leaving `source`.
 */
export class IndexedEdgeView<P, VD extends VertexDescriptor, Id, Inner> extends DescriptorView<
  number,
  IndexedEdgeDescriptor<P, VD, Id, Inner>
> {
  readonly kind = 'indexed' as const

  constructor(
    first: number,
    last: number,
    private readonly src: VD,
    private readonly shape: PayloadShape<P, Id, Inner>,
  ) {
    super(first, last, indexStep)
  }

  protected describe(position: number): IndexedEdgeDescriptor<P, VD, Id, Inner> {
    return new IndexedEdgeDescriptor(position, this.src, this.shape)
  }

  source(): VD {
    return this.src
  }

  /** Number of edges in the view, in O(1). */
  size(): number {
    return this.last - this.first
  }
}

/**
 * Edges between two cursors of forward storage, leaving `source`.
 */
export class PositionalEdgeView<P, VD extends VertexDescriptor, Id, Inner> extends DescriptorView<
  Cursor<P>,
  PositionalEdgeDescriptor<P, VD, Id, Inner>
> {
  readonly kind = 'positional' as const

  constructor(
    first: Cursor<P>,
    last: Cursor<P>,
    private readonly src: VD,
    private readonly shape: PayloadShape<P, Id, Inner>,
  ) {
    super(first, last, cursorStep<Cursor<P>>())
  }

  protected describe(position: Cursor<P>): PositionalEdgeDescriptor<P, VD, Id, Inner> {
    return new PositionalEdgeDescriptor(position, this.src, this.shape)
  }

  source(): VD {
    return this.src
  }
}

/** Any edge view, with its type parameters erased. */
export type AnyEdgeView =
  | IndexedEdgeView<unknown, VertexDescriptor, unknown, unknown>
  | PositionalEdgeView<unknown, VertexDescriptor, unknown, unknown>
