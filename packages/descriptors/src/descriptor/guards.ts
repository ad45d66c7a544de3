/**
 * Descriptor Guards
 */

import { IndexedEdgeDescriptor, PositionalEdgeDescriptor } from './edge'
import { IndexedVertexDescriptor, PositionalVertexDescriptor } from './vertex'

/** Any vertex descriptor, with its type parameters erased. */
export type AnyVertexDescriptor = IndexedVertexDescriptor<unknown> | PositionalVertexDescriptor<unknown, unknown>

/** Any edge descriptor, with its type parameters erased. */
export type AnyEdgeDescriptor =
  | IndexedEdgeDescriptor<unknown, AnyVertexDescriptor, unknown, unknown>
  | PositionalEdgeDescriptor<unknown, AnyVertexDescriptor, unknown, unknown>

export function isVertexDescriptor(value: unknown): value is AnyVertexDescriptor {
  return value instanceof IndexedVertexDescriptor || value instanceof PositionalVertexDescriptor
}

export function isEdgeDescriptor(value: unknown): value is AnyEdgeDescriptor {
  return value instanceof IndexedEdgeDescriptor || value instanceof PositionalEdgeDescriptor
}
