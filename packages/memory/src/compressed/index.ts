/**
 * Compressed Graph Module
 */

export { CompressedGraph } from "./compressed-graph"
export type { CompressedGraphOptions, CompressedVertex } from "./compressed-graph"
