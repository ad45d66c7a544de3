/**
 * Edge Descriptors
 *
 * An edge descriptor is an edge position (index or cursor) plus the
 * descriptor of the vertex the edge leaves from. Advancing moves to the next
 * edge of the same source; the source never changes.
 */

import type { Cursor, ForwardStorage, IndexedStorage } from '../storage'
import type { PayloadShape } from '../shape'
import { combineHashes, hashValue } from '../utils'
import type { EdgeDescriptor, VertexDescriptor } from './types'
import type { IndexedVertexDescriptor } from './vertex'

// =============================================================================
// INDEXED
// =============================================================================

/**
 * Edge stored in random-access storage.
 */
export class IndexedEdgeDescriptor<P, VD extends VertexDescriptor, Id, Inner>
  implements EdgeDescriptor<VD, number>
{
  readonly kind = 'indexed' as const

  constructor(
    private readonly index: number,
    private readonly src: VD,
    private readonly shape: PayloadShape<P, Id, Inner>,
  ) {}

  value(): number {
    return this.index
  }

  source(): VD {
    return this.src
  }

  sourceId<SourceId>(this: { source(): VertexDescriptor<SourceId> }): SourceId {
    return this.source().vertexId()
  }

  /**
   * Identity of the vertex this edge points to, read from the payload.
   */
  targetId(edges: IndexedStorage<P>): Id {
    return this.shape.targetId(edges[this.index])
  }

  underlyingValue(edges: IndexedStorage<P>): P {
    return edges[this.index]
  }

  /** Payload data without the target id. */
  innerValue(edges: IndexedStorage<P>): Inner {
    return this.shape.innerValue(edges[this.index])
  }

  next(): IndexedEdgeDescriptor<P, VD, Id, Inner> {
    return new IndexedEdgeDescriptor(this.index + 1, this.src, this.shape)
  }

  equals(other: EdgeDescriptor): boolean {
    return other instanceof IndexedEdgeDescriptor && other.index === this.index && this.src.equals(other.src)
  }

  /**
   * Orders by edge index, then by source. Only defined for indexed sources.
   */
  compare<E>(
    this: IndexedEdgeDescriptor<P, IndexedVertexDescriptor<E>, Id, Inner>,
    other: IndexedEdgeDescriptor<P, IndexedVertexDescriptor<E>, Id, Inner>,
  ): number {
    return Math.sign(this.index - other.index) || this.src.compare(other.src)
  }

  hash(): number {
    return combineHashes(hashValue(this.index), this.src.hash())
  }

  toString(): string {
    return `EdgeDescriptor(${this.index} from ${String(this.src)})`
  }
}

// =============================================================================
// POSITIONAL
// =============================================================================

/**
 * Edge stored in cursor-addressed storage (linked lists, sets, maps).
 *
 * Everything that reads the payload dereferences the cursor, so none of it
 * may be called on a past-the-end descriptor.
 */
export class PositionalEdgeDescriptor<P, VD extends VertexDescriptor, Id, Inner>
  implements EdgeDescriptor<VD, Cursor<P>>
{
  readonly kind = 'positional' as const

  constructor(
    private readonly cursor: Cursor<P>,
    private readonly src: VD,
    private readonly shape: PayloadShape<P, Id, Inner>,
  ) {}

  value(): Cursor<P> {
    return this.cursor
  }

  source(): VD {
    return this.src
  }

  sourceId<SourceId>(this: { source(): VertexDescriptor<SourceId> }): SourceId {
    return this.source().vertexId()
  }

  /**
   * Identity of the vertex this edge points to. The edge container is implied
   * by the cursor and may be omitted.
   */
  targetId(_edges?: ForwardStorage<P>): Id {
    return this.shape.targetId(this.cursor.get())
  }

  underlyingValue(_edges?: ForwardStorage<P>): P {
    return this.cursor.get()
  }

  innerValue(_edges?: ForwardStorage<P>): Inner {
    return this.shape.innerValue(this.cursor.get())
  }

  next(): PositionalEdgeDescriptor<P, VD, Id, Inner> {
    return new PositionalEdgeDescriptor(this.cursor.next(), this.src, this.shape)
  }

  equals(other: EdgeDescriptor): boolean {
    return (
      other instanceof PositionalEdgeDescriptor && this.cursor.equals(other.cursor) && this.src.equals(other.src)
    )
  }

  /**
   * Hashes the target id rather than the cursor, so equal edges hash alike
   * however their cursors were obtained.
   */
  hash(): number {
    return combineHashes(hashValue(this.targetId()), this.src.hash())
  }

  toString(): string {
    return `EdgeDescriptor(${String(this.targetId())} from ${String(this.src)})`
  }
}
