// @tollgate/core — PBKDF2 password key derivation

import type { CryptoProvider } from './crypto-provider.js'
import type { DerivedKey } from './types.js'
import { DEFAULT_SALT_SIZE, MASTER_KEY_SIZE, PBKDF2_ITERATIONS } from './types.js'
import { utf8Encode } from './encoding.js'

/**
 * Derives a 32-byte master key from a password.
 *
 * Key derivation path:
 * ```
 * PBKDF2(HMAC-SHA256, password, salt, iterations=480000, length=32)
 * ```
 *
 * The same (password, salt) pair always yields the same key. When no salt is
 * supplied, 16 fresh random bytes are used and returned with the key; the
 * caller has to keep the salt to derive the key again.
 *
 * @param cryptoProvider - CryptoProvider for PBKDF2 and salt generation
 * @param password - Password, encoded as UTF-8
 * @param salt - Optional salt
 * @returns The derived key and the salt that produced it
 */
export async function deriveKeyFromPassword(
  cryptoProvider: CryptoProvider,
  password: string,
  salt?: Uint8Array,
): Promise<DerivedKey> {
  const usedSalt = salt ?? cryptoProvider.randomBytes(DEFAULT_SALT_SIZE)
  const bits = await cryptoProvider.pbkdf2(
    utf8Encode(password),
    usedSalt,
    PBKDF2_ITERATIONS,
    MASTER_KEY_SIZE,
  )
  return { key: new Uint8Array(bits), salt: usedSalt }
}
