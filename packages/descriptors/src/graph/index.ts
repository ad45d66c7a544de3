/**
 * Graph Module
 */

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
  type EdgeViewOf,
} from './accessors'
export { adjacencyOf, innerValueIn, targetIdIn, edgeValueIn } from './adjacency'
