/**
 * Payload Shape Types
 *
 * How the identity of the other endpoint (and the remaining data) is read
 * out of a stored edge payload.
 */

/** Payloads that are an identity all by themselves. */
export type Scalar = number | bigint | string | boolean

export type PayloadShapeKind = 'scalar' | 'keyValue' | 'tuple' | 'whole' | 'inferred'

/** Shape of one concrete payload, as decided by `classifyPayload`. */
export type PayloadKind = Exclude<PayloadShapeKind, 'inferred'>

/**
 * Strategy reading a payload `P` as a target id `Id` plus inner data `Inner`.
 */
export interface PayloadShape<P, Id, Inner> {
  readonly kind: PayloadShapeKind
  targetId(payload: P): Id
  innerValue(payload: P): Inner
}

/** Elements of a tuple after the first. */
export type TupleRest<T> = T extends readonly [unknown, ...infer R] ? R : never

/**
 * Target id of a payload, by priority: scalar, `first`, element 0, whole payload.
 * A plain array may be empty, in which case the array itself is the id.
 */
export type TargetIdOf<P> = P extends Scalar
  ? P
  : P extends { readonly first: infer K }
    ? K
    : P extends readonly [infer H, ...unknown[]]
      ? H
      : P extends readonly (infer H)[]
        ? H | P
        : P

/**
 * Inner value of a payload: scalar itself, `second`, element 1 of a pair,
 * the rest of a longer tuple, else the whole payload.
 */
export type InnerValueOf<P> = P extends Scalar
  ? P
  : P extends { readonly second: infer V }
    ? V
    : P extends readonly [unknown, infer V]
      ? V
      : P extends readonly [unknown, ...unknown[]]
        ? TupleRest<P>
        : P extends readonly (infer H)[]
          ? H | H[] | P
          : P
