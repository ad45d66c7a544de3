/**
 * Descriptor Types
 */

import type { StorageKind } from '../storage'

/**
 * Identity half of every vertex descriptor, whatever its storage kind.
 *
 * Container-dependent accessors (`underlyingValue`, `innerValue`) live on the
 * concrete classes because their container parameter depends on the kind.
 */
export interface VertexDescriptor<Id = unknown, Pos = unknown> {
  readonly kind: StorageKind
  /** Raw storage: the index or the cursor. */
  value(): Pos
  vertexId(): Id
  next(): VertexDescriptor<Id, Pos>
  equals(other: VertexDescriptor): boolean
  hash(): number
}

/**
 * Identity half of every edge descriptor.
 */
export interface EdgeDescriptor<VD extends VertexDescriptor = VertexDescriptor, Pos = unknown> {
  readonly kind: StorageKind
  /** Raw edge storage: the index or the cursor. */
  value(): Pos
  source(): VD
  next(): EdgeDescriptor<VD, Pos>
  equals(other: EdgeDescriptor): boolean
  hash(): number
}

/**
 * Descriptors usable as keys of `DescriptorMap` / `DescriptorSet`.
 */
export interface Hashable<D> {
  hash(): number
  equals(other: D): boolean
}

/** Vertex id carried by a vertex descriptor type. */
export type VertexIdOf<VD> = VD extends VertexDescriptor<infer Id> ? Id : never
