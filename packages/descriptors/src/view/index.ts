/**
 * View Module
 */

export { ViewCursor, indexStep, cursorStep, type PositionStep, type Steppable } from './cursor'
export { DescriptorView } from './base'
export { IndexedVertexView, PositionalVertexView, type AnyVertexView } from './vertex-view'
export { IndexedEdgeView, PositionalEdgeView, type AnyEdgeView } from './edge-view'
export { vertexView, edgeView } from './factories'
