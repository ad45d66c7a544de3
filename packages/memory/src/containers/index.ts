/**
 * Containers Module
 */

export { OrderedMap, naturalOrder } from "./ordered-map"
export type { OrderedMapOptions, KeyComparator } from "./ordered-map"
export { LinkedHashMap } from "./linked-hash-map"
export { EntryMap } from "./entry-map"
export type { MapEntry } from "./entry-map"
export { ForwardList, ForwardCursor } from "./forward-list"
export { ListCursor } from "./linked-list"
