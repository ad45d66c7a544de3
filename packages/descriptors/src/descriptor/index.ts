/**
 * Descriptor Module
 */

export { IndexedVertexDescriptor, PositionalVertexDescriptor, keyOf, mappedValueOf } from './vertex'
export type { VertexDescriptorOf } from './vertex'
export { IndexedEdgeDescriptor, PositionalEdgeDescriptor } from './edge'
export { isVertexDescriptor, isEdgeDescriptor } from './guards'
export type { AnyVertexDescriptor, AnyEdgeDescriptor } from './guards'
export type { VertexDescriptor, EdgeDescriptor, Hashable, VertexIdOf } from './types'
