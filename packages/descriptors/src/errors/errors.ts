/**
 * Custom Error Classes
 */

import type { StorageKind } from '../storage/types'

/** Which side of the graph an error concerns. */
export type DescriptorRole = 'vertex' | 'edge'

export interface DescriptorErrorOptions {
  role?: DescriptorRole
  cause?: Error
}

/**
 * Base error for all descriptor errors. `role` is set when the failure is
 * tied to vertex or edge storage.
 */
export class DescriptorError extends Error {
  public readonly role?: DescriptorRole
  public override readonly cause?: Error

  constructor(message: string, options: DescriptorErrorOptions = {}) {
    super(message)
    this.name = 'DescriptorError'
    this.role = options.role
    this.cause = options.cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === 'function') {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Unsupported storage error.
 * Thrown when a value handed over as vertex or edge storage satisfies neither
 * the indexed nor the positional capability.
 */
export class UnsupportedStorageError extends DescriptorError {
  declare readonly role: DescriptorRole

  constructor(
    role: DescriptorRole,
    public readonly reason: string,
  ) {
    super(`Unsupported ${role} storage: ${reason}`, { role })
    this.name = 'UnsupportedStorageError'
  }
}

/**
 * Storage kind mismatch.
 * Thrown when a descriptor is paired with a container of the other storage kind.
 */
export class StorageKindMismatchError extends DescriptorError {
  constructor(
    public readonly expected: StorageKind,
    public readonly actual: StorageKind,
  ) {
    super(`Descriptor expects ${expected} storage, got ${actual} storage`)
    this.name = 'StorageKindMismatchError'
  }
}

/**
 * End of range error.
 * Thrown by cursor backends when the past-the-end position is dereferenced.
 */
export class EndOfRangeError extends DescriptorError {
  constructor(public readonly container?: string) {
    super(container ? `Cannot dereference the end position of ${container}` : 'Cannot dereference an end position')
    this.name = 'EndOfRangeError'
  }
}

/**
 * Payload validation error.
 * Thrown when a vertex or edge payload doesn't match the schema it is parsed with.
 */
export class PayloadValidationError extends DescriptorError {
  declare readonly role: DescriptorRole

  constructor(
    message: string,
    role: DescriptorRole,
    public readonly path?: string,
    public readonly received?: unknown,
  ) {
    super(message, { role })
    this.name = 'PayloadValidationError'
  }
}
