/**
 * Payload Validation
 *
 * Descriptors hand out payloads typed from the container. When the container
 * itself is untyped (parsed JSON, `unknown[]`), these helpers check a payload
 * against a Zod schema on the way out.
 */

import { type z } from 'zod'
import type { EdgeDescriptor, VertexDescriptor } from '../descriptor'
import { PayloadValidationError } from '../errors'
import { edgeValueIn, innerValueIn } from '../graph'
import type { VertexStorage } from '../storage'

function parsePayload<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  role: 'vertex' | 'edge',
  owner: string,
): z.infer<S> {
  const result = schema.safeParse(value)
  if (!result.success) {
    const firstError = result.error.errors[0]
    const path = firstError?.path.join('.')
    throw new PayloadValidationError(
      `Invalid ${role} value of ${owner}: ${firstError?.message ?? 'validation failed'}`,
      role,
      path === '' ? undefined : path,
      value,
    )
  }
  return result.data
}

/**
 * Inner value of `u`, checked against `schema`.
 * @throws PayloadValidationError if the value does not match
 */
export function parseVertexValue<S extends z.ZodTypeAny>(
  g: VertexStorage,
  u: VertexDescriptor,
  schema: S,
): z.infer<S> {
  return parsePayload(schema, innerValueIn(g, u), 'vertex', String(u))
}

/**
 * Payload data of `uv` (without the target id), checked against `schema`.
 * @throws PayloadValidationError if the value does not match
 */
export function parseEdgeValue<S extends z.ZodTypeAny>(
  g: VertexStorage,
  uv: EdgeDescriptor,
  schema: S,
): z.infer<S> {
  return parsePayload(schema, edgeValueIn(g, uv), 'edge', String(uv))
}
