/**
 * Utilities Module
 */

export { fnv1a32, hashValue, combineHashes } from './hash'
