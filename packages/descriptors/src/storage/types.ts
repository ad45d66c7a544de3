/**
 * Storage Capability Types
 *
 * Descriptors never own the containers they point into. They only rely on
 * one of two access capabilities:
 * - indexed: O(1) offset access, the descriptor stores an integer
 * - positional: sequential movement through opaque cursors, the descriptor stores the cursor
 */

// =============================================================================
// KINDS
// =============================================================================

export type StorageKind = 'indexed' | 'positional'

// =============================================================================
// INDEXED STORAGE
// =============================================================================

/**
 * Random-access storage addressed by integer offsets (arrays, typed arrays, array-likes).
 */
export interface IndexedStorage<T> {
  readonly length: number
  readonly [index: number]: T
}

// =============================================================================
// CURSORS
// =============================================================================

/**
 * Opaque, immutable position inside positional storage.
 *
 * Advancing returns a new cursor. Dereferencing the past-the-end cursor is a
 * caller error.
 */
export interface Cursor<T> {
  /** Element at this position. */
  get(): T
  /** Cursor to the following position. */
  next(): Cursor<T>
  /** True when both cursors denote the same position of the same container. */
  equals(other: Cursor<T>): boolean
}

/**
 * Cursor that can also step backwards.
 */
export interface BidirectionalCursor<T> extends Cursor<T> {
  next(): BidirectionalCursor<T>
  prev(): BidirectionalCursor<T>
}

// =============================================================================
// POSITIONAL STORAGE
// =============================================================================

/**
 * Storage traversed once, front to back.
 */
export interface ForwardStorage<T> {
  begin(): Cursor<T>
  end(): Cursor<T>
}

/**
 * Storage traversed in both directions.
 */
export interface BidirectionalStorage<T> extends ForwardStorage<T> {
  begin(): BidirectionalCursor<T>
  end(): BidirectionalCursor<T>
}

/**
 * Bidirectional storage with keyed lookup. `find` returns `end()` for absent keys.
 */
export interface KeyedStorage<K, T> extends BidirectionalStorage<T> {
  find(key: K): BidirectionalCursor<T>
}

/**
 * Storage that reports its element count without walking.
 */
export interface SizedStorage {
  readonly size: number
}

// =============================================================================
// PAIR-LIKE ELEMENTS
// =============================================================================

/** Key and value reachable positionally, like `Map` entries. */
export type KeyValueTuple<K, V> = readonly [K, V, ...unknown[]]

/** Key and value reachable through named accessors. */
export interface KeyValueObject<K, V> {
  readonly first: K
  readonly second: V
}

/**
 * An element exposing a key (component 0) and a value (component 1).
 */
export type PairLike<K = unknown, V = unknown> = KeyValueTuple<K, V> | KeyValueObject<K, V>
