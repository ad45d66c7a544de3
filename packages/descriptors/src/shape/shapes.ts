/**
 * Payload Shapes
 *
 * A shape is picked once, when an edge view is built, and travels with every
 * descriptor the view produces. Call sites never inspect payloads themselves.
 */

import type { KeyValueObject } from '../storage'
import type {
  InnerValueOf,
  PayloadKind,
  PayloadShape,
  Scalar,
  TargetIdOf,
  TupleRest,
} from './types'

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * Classify one payload in priority order: scalar, `first`/`second`,
 * positional (non-empty array), whole.
 */
export function classifyPayload(payload: unknown): PayloadKind {
  switch (typeof payload) {
    case 'number':
    case 'bigint':
    case 'string':
    case 'boolean':
      return 'scalar'
  }
  if (typeof payload === 'object' && payload !== null && 'first' in payload) return 'keyValue'
  if (Array.isArray(payload) && payload.length > 0) return 'tuple'
  return 'whole'
}

function inferredTargetId(payload: unknown): unknown {
  switch (classifyPayload(payload)) {
    case 'keyValue':
      return typeof payload === 'object' && payload !== null && 'first' in payload ? payload.first : payload
    case 'tuple':
      return Array.isArray(payload) ? payload[0] : payload
    default:
      return payload
  }
}

function inferredInnerValue(payload: unknown): unknown {
  switch (classifyPayload(payload)) {
    case 'keyValue':
      return typeof payload === 'object' && payload !== null && 'second' in payload ? payload.second : payload
    case 'tuple':
      if (!Array.isArray(payload)) return payload
      return payload.length === 2 ? payload[1] : payload.slice(1)
    default:
      return payload
  }
}

const INFERRED: PayloadShape<unknown, unknown, unknown> = {
  kind: 'inferred',
  targetId: inferredTargetId,
  innerValue: inferredInnerValue,
}

const TUPLE: PayloadShape<readonly unknown[], unknown, unknown[]> = {
  kind: 'tuple',
  targetId: (payload) => payload[0],
  innerValue: (payload) => payload.slice(1),
}

// =============================================================================
// SHAPE FACTORIES
// =============================================================================

/**
 * The payload is the target id.
 */
function scalar<P extends Scalar>(): PayloadShape<P, P, P> {
  return { kind: 'scalar', targetId: (payload) => payload, innerValue: (payload) => payload }
}

/**
 * `{ first, second }`: target `first`, data `second`.
 */
function keyValue<K, V>(): PayloadShape<KeyValueObject<K, V>, K, V> {
  return { kind: 'keyValue', targetId: (payload) => payload.first, innerValue: (payload) => payload.second }
}

/**
 * `[target, data]`.
 */
function pair<K, V>(): PayloadShape<readonly [K, V], K, V> {
  return { kind: 'tuple', targetId: (payload) => payload[0], innerValue: (payload) => payload[1] }
}

/**
 * `[target, ...data]`: the data is every element after the first.
 */
function tuple<T extends readonly [unknown, ...unknown[]]>(): PayloadShape<T, T[0], TupleRest<T>>
function tuple(): PayloadShape<readonly unknown[], unknown, unknown[]> {
  return TUPLE
}

/**
 * The whole payload is the target id and carries no separate data.
 */
function whole<P>(): PayloadShape<P, P, P> {
  return { kind: 'whole', targetId: (payload) => payload, innerValue: (payload) => payload }
}

/**
 * Classify each payload at access time. Typed with `TargetIdOf` / `InnerValueOf`,
 * which apply the same priority order statically.
 */
function inferred<P>(): PayloadShape<P, TargetIdOf<P>, InnerValueOf<P>>
function inferred(): PayloadShape<unknown, unknown, unknown> {
  return INFERRED
}

export const shapes = {
  scalar,
  keyValue,
  pair,
  tuple,
  whole,
  inferred,
} as const
