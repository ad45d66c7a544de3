/**
 * In-Memory Graph Storage
 *
 * Containers that plug into `@graphdesc/descriptors` as positional backends,
 * plus a compressed sparse row graph built on global edge storage.
 *
 * @example
 * ```typescript
 * import { vertices, edges, targetId } from '@graphdesc/descriptors'
 * import { OrderedMap, ForwardList } from '@graphdesc/memory'
 *
 * // Keyed adjacency: vertex ids are the map keys, rows are forward lists
 * const g = new OrderedMap<number, ForwardList<number>>([
 *   [100, new ForwardList([200])],
 *   [200, new ForwardList([100, 200])],
 * ])
 *
 * for (const u of vertices(g)) {
 *   for (const uv of edges(g, u)) {
 *     console.log(u.vertexId(), '->', targetId(g, uv))
 *   }
 * }
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// CONTAINERS
// =============================================================================

export { OrderedMap, LinkedHashMap, ForwardList, EntryMap, ListCursor, ForwardCursor, naturalOrder } from "./containers"
export type { OrderedMapOptions, KeyComparator, MapEntry } from "./containers"

// =============================================================================
// COMPRESSED GRAPH
// =============================================================================

export { CompressedGraph } from "./compressed"
export type { CompressedGraphOptions, CompressedVertex } from "./compressed"
