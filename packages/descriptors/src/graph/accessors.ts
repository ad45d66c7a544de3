/**
 * Graph Accessors
 *
 * Free functions over an adjacency container, so algorithms can be written
 * once against `number[][]`, `Map`-like keyed storage of edge lists, and
 * anything in between.
 *
 * @example
 * ```typescript
 * const g = [[1, 2], [2], []]
 * for (const u of vertices(g)) {
 *   for (const uv of edges(g, u)) {
 *     console.log(vertexId(g, u), '->', targetId(g, uv))
 *   }
 * }
 * ```
 */

import {
  IndexedVertexDescriptor,
  PositionalVertexDescriptor,
  keyOf,
  type AnyVertexDescriptor,
  type EdgeDescriptor,
  type VertexDescriptor,
} from '../descriptor'
import type { InnerValueOf, TargetIdOf } from '../shape'
import {
  classifyVertexStorage,
  isIndexedStorage,
  type BidirectionalCursor,
  type BidirectionalStorage,
  type EdgeStorage,
  type ForwardStorage,
  type IndexedStorage,
  type KeyValueObject,
  type KeyValueTuple,
  type PairLike,
  type VertexStorage,
} from '../storage'
import {
  edgeView,
  vertexView,
  type AnyEdgeView,
  type AnyVertexView,
  type IndexedEdgeView,
  type IndexedVertexView,
  type PositionalEdgeView,
  type PositionalVertexView,
} from '../view'
import { adjacencyOf, targetIdIn } from './adjacency'

/**
 * Edge view type for a row type `R`, with sources of type `VD`.
 */
export type EdgeViewOf<R, VD extends VertexDescriptor> =
  R extends IndexedStorage<infer P>
    ? IndexedEdgeView<P, VD, TargetIdOf<P>, InnerValueOf<P>>
    : R extends ForwardStorage<infer P>
      ? PositionalEdgeView<P, VD, TargetIdOf<P>, InnerValueOf<P>>
      : never

function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || (a !== a && b !== b)
}

function countRange(storage: ForwardStorage<unknown>): number {
  let count = 0
  const end = storage.end()
  for (let cursor = storage.begin(); !cursor.equals(end); cursor = cursor.next()) count++
  return count
}

function hasFind(
  g: BidirectionalStorage<PairLike>,
): g is BidirectionalStorage<PairLike> & { find(key: unknown): BidirectionalCursor<PairLike> } {
  return 'find' in g && typeof g.find === 'function'
}

// =============================================================================
// VERTICES
// =============================================================================

/** Every vertex of `g`. */
export function vertices<E>(g: IndexedStorage<E>): IndexedVertexView<E>
export function vertices<K, V>(g: BidirectionalStorage<KeyValueTuple<K, V>>): PositionalVertexView<K, V>
export function vertices<K, V>(g: BidirectionalStorage<KeyValueObject<K, V>>): PositionalVertexView<K, V>
export function vertices(g: VertexStorage): AnyVertexView
export function vertices(g: VertexStorage): AnyVertexView {
  return vertexView(g)
}

export function vertexId<Id>(_g: VertexStorage, u: VertexDescriptor<Id>): Id {
  return u.vertexId()
}

/**
 * Descriptor of the vertex with the given id, or `undefined` when `g` has no
 * such vertex. Keyed backends are searched with their own `find()`; other
 * positional backends are walked.
 *
 * @throws whatever a keyed backend's `find()` throws, such as a sorted map
 * that cannot compare `id` with its keys
 */
export function findVertex<E>(g: IndexedStorage<E>, id: number): IndexedVertexDescriptor<E> | undefined
export function findVertex<K, V>(
  g: BidirectionalStorage<KeyValueTuple<K, V>>,
  id: K,
): PositionalVertexDescriptor<K, V> | undefined
export function findVertex<K, V>(
  g: BidirectionalStorage<KeyValueObject<K, V>>,
  id: K,
): PositionalVertexDescriptor<K, V> | undefined
export function findVertex(g: VertexStorage, id: unknown): AnyVertexDescriptor | undefined
export function findVertex(g: VertexStorage, id: unknown): AnyVertexDescriptor | undefined {
  classifyVertexStorage(g)
  if (isIndexedStorage(g)) {
    const inRange = typeof id === 'number' && Number.isInteger(id) && id >= 0 && id < g.length
    return inRange ? new IndexedVertexDescriptor<unknown>(id) : undefined
  }

  const end = g.end()
  if (hasFind(g)) {
    const found = g.find(id)
    return found.equals(end) ? undefined : new PositionalVertexDescriptor<unknown, unknown>(found)
  }
  for (let cursor = g.begin(); !cursor.equals(end); cursor = cursor.next()) {
    if (sameValueZero(keyOf(cursor.get()), id)) return new PositionalVertexDescriptor<unknown, unknown>(cursor)
  }
  return undefined
}

/**
 * Number of vertices. Array-likes report their length, sized backends their
 * `size`; anything else is walked.
 */
export function numVertices(g: VertexStorage): number {
  if (isIndexedStorage(g)) return g.length
  if ('size' in g && typeof g.size === 'number') return g.size
  return countRange(g)
}

// =============================================================================
// EDGES
// =============================================================================

/**
 * Out-edges of `u`, with `u` as the source of every descriptor.
 * @throws UnsupportedStorageError if u's row is not edge storage
 */
export function edges<R extends EdgeStorage>(
  g: IndexedStorage<R>,
  u: IndexedVertexDescriptor<R>,
): EdgeViewOf<R, IndexedVertexDescriptor<R>>
export function edges<K, R extends EdgeStorage>(
  g: BidirectionalStorage<KeyValueTuple<K, R>>,
  u: PositionalVertexDescriptor<K, R>,
): EdgeViewOf<R, PositionalVertexDescriptor<K, R>>
export function edges<K, R extends EdgeStorage>(
  g: BidirectionalStorage<KeyValueObject<K, R>>,
  u: PositionalVertexDescriptor<K, R>,
): EdgeViewOf<R, PositionalVertexDescriptor<K, R>>
export function edges(g: VertexStorage, u: VertexDescriptor): AnyEdgeView
export function edges(g: VertexStorage, u: VertexDescriptor): unknown {
  return edgeView(adjacencyOf(g, u), u)
}

/**
 * Number of out-edges of `u`. Indexed rows report their length; cursor rows
 * are walked.
 */
export function degree(g: VertexStorage, u: VertexDescriptor): number {
  const row = adjacencyOf(g, u)
  return isIndexedStorage(row) ? row.length : countRange(row)
}

export function targetId<Id>(g: VertexStorage, uv: EdgeDescriptor & { targetId(...args: never[]): Id }): Id
export function targetId(g: VertexStorage, uv: EdgeDescriptor): unknown
export function targetId(g: VertexStorage, uv: EdgeDescriptor): unknown {
  return targetIdIn(g, uv)
}

/**
 * Descriptor of the vertex `uv` points to, or `undefined` for a dangling edge.
 * Lookup goes through `findVertex`, so a keyed backend that cannot compare the
 * target id with its keys throws from its `find()`.
 */
export function target<E>(g: IndexedStorage<E>, uv: EdgeDescriptor): IndexedVertexDescriptor<E> | undefined
export function target<K, V>(
  g: BidirectionalStorage<KeyValueTuple<K, V>>,
  uv: EdgeDescriptor,
): PositionalVertexDescriptor<K, V> | undefined
export function target<K, V>(
  g: BidirectionalStorage<KeyValueObject<K, V>>,
  uv: EdgeDescriptor,
): PositionalVertexDescriptor<K, V> | undefined
export function target(g: VertexStorage, uv: EdgeDescriptor): AnyVertexDescriptor | undefined
export function target(g: VertexStorage, uv: EdgeDescriptor): AnyVertexDescriptor | undefined {
  return findVertex(g, targetIdIn(g, uv))
}

export function sourceId<Id>(_g: VertexStorage, uv: EdgeDescriptor<VertexDescriptor<Id>>): Id {
  return uv.source().vertexId()
}

export function source<VD extends VertexDescriptor>(_g: VertexStorage, uv: EdgeDescriptor<VD>): VD {
  return uv.source()
}
