/**
 * Descriptor Hashing
 *
 * Unsigned 32-bit hashes for descriptors used as keys. Primitive values hash
 * by content so independently built descriptors for the same vertex hash
 * alike; objects hash by identity, matching `Map` key semantics.
 */

/** FNV-1a 32-bit offset basis */
const FNV_OFFSET_BASIS = 2166136261

/** FNV-1a 32-bit prime */
const FNV_PRIME = 16777619

/**
 * FNV-1a hash of a string.
 */
export function fnv1a32(input: string): number {
  let hash = FNV_OFFSET_BASIS
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i)
    hash = Math.imul(hash, FNV_PRIME)
  }
  return hash >>> 0
}

const identities = new WeakMap<object, number>()
let nextIdentity = 0

function identityOf(value: object): number {
  const existing = identities.get(value)
  if (existing !== undefined) return existing
  nextIdentity += 1
  identities.set(value, nextIdentity)
  return nextIdentity
}

/**
 * Hash any vertex or edge identity.
 *
 * Values that compare equal under SameValueZero hash equally (`0` and `-0`
 * included). The type tag keeps `1`, `'1'` and `1n` apart.
 */
export function hashValue(value: unknown): number {
  if (value === null) return fnv1a32('null')
  switch (typeof value) {
    case 'object':
    case 'function':
      return fnv1a32(`ref:${identityOf(value)}`)
    case 'symbol':
      return fnv1a32(`symbol:${value.description ?? ''}`)
    default:
      return fnv1a32(`${typeof value}:${String(value)}`)
  }
}

/**
 * Mix two hashes. Order matters: `combineHashes(a, b)` and `combineHashes(b, a)` differ.
 */
export function combineHashes(first: number, second: number): number {
  return (first ^ (second << 1)) >>> 0
}
