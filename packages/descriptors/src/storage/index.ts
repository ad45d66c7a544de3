/**
 * Storage Module
 */

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
} from './types'

export type { VertexStorage, EdgeStorage, VertexAccessKind, EdgeAccessKind, ElementOf } from './access'

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
} from './access'
