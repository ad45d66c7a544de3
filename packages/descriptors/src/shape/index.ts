/**
 * Payload Shape Module
 */

export { shapes, classifyPayload } from './shapes'
export type {
  Scalar,
  PayloadShape,
  PayloadShapeKind,
  PayloadKind,
  TargetIdOf,
  InnerValueOf,
  TupleRest,
} from './types'
