/**
 * Errors Module
 */

export {
  DescriptorError,
  UnsupportedStorageError,
  StorageKindMismatchError,
  EndOfRangeError,
  PayloadValidationError,
  type DescriptorRole,
  type DescriptorErrorOptions,
} from './errors'
