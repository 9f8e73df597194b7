// @tollgate/core — Salted SHA-256 hashing and constant-time comparison

import type { CryptoProvider } from './crypto-provider.js'
import type { SaltedDigest } from './types.js'
import { DEFAULT_SALT_SIZE } from './types.js'
import { concatBuffers, utf8Encode } from './encoding.js'

/** Hash input: raw bytes, or a string hashed as UTF-8 */
export type HashInput = Uint8Array | string

function toBytes(data: HashInput): Uint8Array {
  return typeof data === 'string' ? utf8Encode(data) : data
}

/**
 * Computes `SHA-256(salt ‖ data)`.
 *
 * When no salt is given, a fresh 16-byte salt is drawn from the provider.
 * The salt is always returned so the caller can store it beside the digest.
 */
export async function hashData(
  cryptoProvider: CryptoProvider,
  data: HashInput,
  salt?: Uint8Array,
): Promise<SaltedDigest> {
  const usedSalt = salt ?? cryptoProvider.randomBytes(DEFAULT_SALT_SIZE)
  const digest = await cryptoProvider.hash(concatBuffers(usedSalt, toBytes(data)))
  return { digest: new Uint8Array(digest), salt: usedSalt }
}

/**
 * Recomputes the digest of `data` under `salt` and compares it with
 * `expectedDigest` in constant time.
 */
export async function verifyHash(
  cryptoProvider: CryptoProvider,
  data: HashInput,
  expectedDigest: Uint8Array,
  salt: Uint8Array,
): Promise<boolean> {
  const { digest } = await hashData(cryptoProvider, data, salt)
  return constantTimeEqual(digest, expectedDigest)
}

/**
 * Constant-time buffer comparison.
 *
 * Compares all bytes regardless of where a mismatch occurs.
 * Length difference is also detected without early return.
 *
 * @param a - First buffer
 * @param b - Second buffer
 * @returns true if buffers are identical, false otherwise
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  const length = Math.max(a.length, b.length)
  let result = a.length ^ b.length // Non-zero if lengths differ
  for (let i = 0; i < length; i++) {
    result |= (a[i] ?? 0) ^ (b[i] ?? 0)
  }
  return result === 0
}
