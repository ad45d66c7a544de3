/**
 * View Factories
 *
 * The storage kind is decided here, once per view. Everything downstream
 * works on the concrete view and descriptor classes.
 */

import type { VertexDescriptor } from '../descriptor'
import { shapes, type InnerValueOf, type PayloadShape, type TargetIdOf } from '../shape'
import {
  classifyEdgeStorage,
  classifyVertexStorage,
  isIndexedStorage,
  type BidirectionalStorage,
  type EdgeStorage,
  type ForwardStorage,
  type IndexedStorage,
  type KeyValueObject,
  type KeyValueTuple,
  type VertexStorage,
} from '../storage'
import { IndexedEdgeView, PositionalEdgeView, type AnyEdgeView } from './edge-view'
import { IndexedVertexView, PositionalVertexView, type AnyVertexView } from './vertex-view'

// =============================================================================
// VERTICES
// =============================================================================

/**
 * View over every vertex of a container.
 *
 * @example
 * ```typescript
 * for (const u of vertexView(['a', 'b', 'c'])) u.vertexId() // 0, 1, 2
 * for (const u of vertexView(new OrderedMap([[100, 'A']]))) u.vertexId() // 100
 * ```
 *
 * @throws UnsupportedStorageError when the container offers neither access kind,
 * or its positional elements are not `(key, value)` pairs
 */
export function vertexView<E>(container: IndexedStorage<E>): IndexedVertexView<E>
export function vertexView<K, V>(container: BidirectionalStorage<KeyValueTuple<K, V>>): PositionalVertexView<K, V>
export function vertexView<K, V>(container: BidirectionalStorage<KeyValueObject<K, V>>): PositionalVertexView<K, V>
export function vertexView(container: VertexStorage): AnyVertexView
export function vertexView(container: VertexStorage): AnyVertexView {
  classifyVertexStorage(container)
  if (isIndexedStorage(container)) {
    return new IndexedVertexView<unknown>(0, container.length)
  }
  return new PositionalVertexView<unknown, unknown>(container.begin(), container.end())
}

// =============================================================================
// EDGES
// =============================================================================

/**
 * View over every edge of one vertex's edge container. The payload shape
 * defaults to inferring it per payload.
 *
 * @example
 * ```typescript
 * const row: Array<[number, string]> = [[1, 'x'], [2, 'y']]
 * for (const e of edgeView(row, u)) e.targetId(row) // 1, 2
 * ```
 *
 * @throws UnsupportedStorageError when the container offers neither access kind
 */
export function edgeView<P, VD extends VertexDescriptor>(
  edges: IndexedStorage<P>,
  source: VD,
): IndexedEdgeView<P, VD, TargetIdOf<P>, InnerValueOf<P>>
export function edgeView<P, VD extends VertexDescriptor, Id, Inner>(
  edges: IndexedStorage<P>,
  source: VD,
  shape: PayloadShape<P, Id, Inner>,
): IndexedEdgeView<P, VD, Id, Inner>
export function edgeView<P, VD extends VertexDescriptor>(
  edges: ForwardStorage<P>,
  source: VD,
): PositionalEdgeView<P, VD, TargetIdOf<P>, InnerValueOf<P>>
export function edgeView<P, VD extends VertexDescriptor, Id, Inner>(
  edges: ForwardStorage<P>,
  source: VD,
  shape: PayloadShape<P, Id, Inner>,
): PositionalEdgeView<P, VD, Id, Inner>
export function edgeView(
  edges: EdgeStorage,
  source: VertexDescriptor,
  shape?: PayloadShape<unknown, unknown, unknown>,
): AnyEdgeView
export function edgeView(
  edges: EdgeStorage,
  source: VertexDescriptor,
  shape: PayloadShape<unknown, unknown, unknown> = shapes.inferred(),
): AnyEdgeView {
  classifyEdgeStorage(edges)
  if (isIndexedStorage(edges)) {
    return new IndexedEdgeView(0, edges.length, source, shape)
  }
  return new PositionalEdgeView(edges.begin(), edges.end(), source, shape)
}
