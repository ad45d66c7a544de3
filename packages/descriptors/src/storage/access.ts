/**
 * Capability Constraints
 *
 * The single dispatch point deciding whether a container is addressed by
 * index or by cursor. The type-level predicates reject unsupported backends
 * at compile time. The runtime guards do the same for untyped callers.
 */

import { UnsupportedStorageError } from '../errors'
import type {
  BidirectionalCursor,
  BidirectionalStorage,
  Cursor,
  ForwardStorage,
  IndexedStorage,
  KeyedStorage,
  PairLike,
  StorageKind,
} from './types'

// =============================================================================
// TYPE-LEVEL CLASSIFICATION
// =============================================================================

/** Anything usable as vertex storage. */
export type VertexStorage = IndexedStorage<unknown> | BidirectionalStorage<PairLike>

/** Anything usable as edge storage. */
export type EdgeStorage = IndexedStorage<unknown> | ForwardStorage<unknown>

/**
 * Access kind of a vertex container: `'indexed'` for random access,
 * `'positional'` for bidirectional cursors over pair-like elements, `never` otherwise.
 */
export type VertexAccessKind<S> =
  S extends IndexedStorage<unknown>
    ? 'indexed'
    : S extends BidirectionalStorage<infer E>
      ? [E] extends [PairLike]
        ? 'positional'
        : never
      : never

/**
 * Access kind of an edge container: `'indexed'` for random access,
 * `'positional'` for anything with at least forward cursors, `never` otherwise.
 */
export type EdgeAccessKind<S> =
  S extends IndexedStorage<unknown> ? 'indexed' : S extends ForwardStorage<unknown> ? 'positional' : never

/** Element type held by a container. */
export type ElementOf<S> =
  S extends IndexedStorage<infer E> ? E : S extends ForwardStorage<infer E> ? E : never

// =============================================================================
// RUNTIME GUARDS
// =============================================================================

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function'
}

/**
 * True for cursor-based storage (`begin()` and `end()`).
 */
export function isForwardStorage(value: unknown): value is ForwardStorage<unknown> {
  return (
    isObjectLike(value) &&
    'begin' in value &&
    typeof value.begin === 'function' &&
    'end' in value &&
    typeof value.end === 'function'
  )
}

/**
 * True for random-access storage: arrays, typed arrays, strings and objects
 * with a numeric `length`. Functions are not storage. A container that also
 * has `begin()`/`end()` is still indexed, matching `VertexAccessKind` and
 * `EdgeAccessKind`.
 */
export function isIndexedStorage(value: unknown): value is IndexedStorage<unknown> {
  if (Array.isArray(value) || typeof value === 'string') return true
  if (ArrayBuffer.isView(value)) return !(value instanceof DataView)
  return typeof value === 'object' && value !== null && 'length' in value && typeof value.length === 'number'
}

export function isBidirectionalCursor<T>(cursor: Cursor<T>): cursor is BidirectionalCursor<T> {
  return 'prev' in cursor && typeof cursor.prev === 'function'
}

export function isBidirectionalStorage(value: unknown): value is BidirectionalStorage<unknown> {
  return isForwardStorage(value) && isBidirectionalCursor(value.begin())
}

/**
 * True for storage that can look an element up by key.
 */
export function isKeyedStorage(value: unknown): value is KeyedStorage<unknown, unknown> {
  return isBidirectionalStorage(value) && 'find' in value && typeof value.find === 'function'
}

/**
 * True when a value exposes a key and a value, either positionally
 * (`[key, value, ...]`) or through `first`/`second`.
 */
export function isPairLike(value: unknown): value is PairLike {
  if (Array.isArray(value)) return value.length >= 2
  return isObjectLike(value) && 'first' in value && 'second' in value
}

function vertexStorageProblem(value: unknown): string | undefined {
  if (isIndexedStorage(value)) return undefined
  if (!isForwardStorage(value)) return 'expected an array-like or a container with begin()/end() cursors'

  const first = value.begin()
  if (!isBidirectionalCursor(first)) return 'positional vertex storage needs bidirectional cursors'
  if (!first.equals(value.end()) && !isPairLike(first.get())) {
    return 'positional vertex elements must be pair-like (key, value)'
  }
  return undefined
}

export function isVertexStorage(value: unknown): value is VertexStorage {
  return vertexStorageProblem(value) === undefined
}

export function isEdgeStorage(value: unknown): value is EdgeStorage {
  return isIndexedStorage(value) || isForwardStorage(value)
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * Classify a vertex container.
 * @throws UnsupportedStorageError if the container is neither indexed nor positional
 */
export function classifyVertexStorage(value: unknown): StorageKind {
  const problem = vertexStorageProblem(value)
  if (problem !== undefined) {
    throw new UnsupportedStorageError('vertex', problem)
  }
  return isIndexedStorage(value) ? 'indexed' : 'positional'
}

/**
 * Classify an edge container.
 * @throws UnsupportedStorageError if the container supports neither offsets nor forward cursors
 */
export function classifyEdgeStorage(value: unknown): StorageKind {
  if (isIndexedStorage(value)) return 'indexed'
  if (isForwardStorage(value)) return 'positional'
  throw new UnsupportedStorageError('edge', 'expected an array-like or a container with begin()/end() cursors')
}
