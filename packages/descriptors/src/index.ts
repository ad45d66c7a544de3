/**
 * Graph Descriptors - Storage-Agnostic Vertex and Edge Handles
 *
 * Lightweight, copyable handles to vertices and edges of graph containers,
 * plus lazy views producing them. Random-access containers are addressed by
 * index, cursor-based containers by cursor, and the choice is made once,
 * when a view is built.
 *
 * @example
 * ```typescript
 * import { vertices, edges, targetId, vertexView, edgeView, shapes } from '@graphdesc/descriptors'
 *
 * // Adjacency list: vertex i owns the edge list g[i]
 * const g: Array<Array<[number, string]>> = [[[1, 'a'], [2, 'b']], [[2, 'c']], []]
 *
 * for (const u of vertices(g)) {
 *   for (const uv of edges(g, u)) {
 *     console.log(u.vertexId(), '->', targetId(g, uv), uv.innerValue(g[u.vertexId()]))
 *   }
 * }
 *
 * // Explicit payload shape, picked once for the whole view
 * const out = edgeView(g[0], vertexView(g).begin().get(), shapes.pair<number, string>())
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// STORAGE
// =============================================================================

export {
  isForwardStorage,
  isIndexedStorage,
  isBidirectionalCursor,
  isBidirectionalStorage,
  isKeyedStorage,
  isPairLike,
  isVertexStorage,
  isEdgeStorage,
  classifyVertexStorage,
  classifyEdgeStorage,
} from './storage'
export type {
  StorageKind,
  IndexedStorage,
  Cursor,
  BidirectionalCursor,
  ForwardStorage,
  BidirectionalStorage,
  KeyedStorage,
  SizedStorage,
  KeyValueTuple,
  KeyValueObject,
  PairLike,
  VertexStorage,
  EdgeStorage,
  VertexAccessKind,
  EdgeAccessKind,
  ElementOf,
} from './storage'

// =============================================================================
// PAYLOAD SHAPES
// =============================================================================

export { shapes, classifyPayload } from './shape'
export type {
  Scalar,
  PayloadShape,
  PayloadShapeKind,
  PayloadKind,
  TargetIdOf,
  InnerValueOf,
  TupleRest,
} from './shape'

// =============================================================================
// DESCRIPTORS
// =============================================================================

export {
  IndexedVertexDescriptor,
  PositionalVertexDescriptor,
  IndexedEdgeDescriptor,
  PositionalEdgeDescriptor,
  keyOf,
  mappedValueOf,
  isVertexDescriptor,
  isEdgeDescriptor,
} from './descriptor'
export type {
  VertexDescriptor,
  EdgeDescriptor,
  Hashable,
  VertexIdOf,
  VertexDescriptorOf,
  AnyVertexDescriptor,
  AnyEdgeDescriptor,
} from './descriptor'

// =============================================================================
// VIEWS
// =============================================================================

export {
  DescriptorView,
  ViewCursor,
  IndexedVertexView,
  PositionalVertexView,
  IndexedEdgeView,
  PositionalEdgeView,
  vertexView,
  edgeView,
  indexStep,
  cursorStep,
} from './view'
export type { AnyVertexView, AnyEdgeView, PositionStep, Steppable } from './view'

// =============================================================================
// COLLECTIONS
// =============================================================================

export { DescriptorMap, DescriptorSet } from './collections'

// =============================================================================
// GRAPH ACCESSORS
// =============================================================================

export {
  vertices,
  vertexId,
  findVertex,
  numVertices,
  edges,
  degree,
  targetId,
  target,
  sourceId,
  source,
  adjacencyOf,
} from './graph'
export type { EdgeViewOf } from './graph'

// =============================================================================
// VALIDATION
// =============================================================================

export { parseVertexValue, parseEdgeValue } from './validation'

// =============================================================================
// ERRORS
// =============================================================================

export {
  DescriptorError,
  UnsupportedStorageError,
  StorageKindMismatchError,
  EndOfRangeError,
  PayloadValidationError,
  type DescriptorRole,
  type DescriptorErrorOptions,
} from './errors'

// =============================================================================
// UTILITIES
// =============================================================================

export { fnv1a32, hashValue, combineHashes } from './utils'
