// @tollgate/core — Master key normalization, splitting and import

import type { CryptoProvider } from './crypto-provider.js'
import { EncryptionError } from './errors.js'
import { ENCRYPTION_KEY_SIZE, MASTER_KEY_SIZE, SIGNING_KEY_SIZE } from './types.js'
import { fromBase64Url, toBase64Url } from './encoding.js'
import { WebCryptoCryptoProvider } from './web-crypto-provider.js'

/** Master key as raw bytes or as base64url text */
export type MasterKeyInput = Uint8Array | string

/**
 * The two halves of a master key, imported for use.
 *
 * - `signingKey`: HMAC-SHA256 over the first 16 bytes
 * - `encryptionKey`: AES-128-CBC over the last 16 bytes
 */
export interface CipherKeys {
  readonly signingKey: CryptoKey
  readonly encryptionKey: CryptoKey
}

/**
 * Converts a master key to exactly 32 raw bytes.
 *
 * Strings are read as base64url (padding optional). The returned array is a
 * private copy, so later writes to the caller's buffer cannot change it.
 *
 * @throws {EncryptionError} If the input does not decode to 32 bytes
 */
export function normalizeMasterKey(input: MasterKeyInput): Uint8Array {
  let bytes: Uint8Array
  if (typeof input === 'string') {
    try {
      bytes = fromBase64Url(input)
    } catch (err) {
      throw new EncryptionError('Invalid master key: not base64url', { cause: err })
    }
  } else {
    bytes = input
  }

  if (bytes.length !== MASTER_KEY_SIZE) {
    throw new EncryptionError(
      `Invalid master key: expected ${String(MASTER_KEY_SIZE)} bytes, ` +
        `got ${String(bytes.length)} bytes`,
    )
  }

  return bytes.slice()
}

/**
 * Splits a 32-byte master key and imports both halves.
 *
 * @param cryptoProvider - CryptoProvider for key import
 * @param masterKey - Master key (raw or base64url)
 * @throws {EncryptionError} If the key is malformed or cannot be imported
 */
export async function importCipherKeys(
  cryptoProvider: CryptoProvider,
  masterKey: MasterKeyInput,
): Promise<CipherKeys> {
  const raw = normalizeMasterKey(masterKey)
  try {
    const signingKey = await cryptoProvider.importSigningKey(raw.subarray(0, SIGNING_KEY_SIZE))
    const encryptionKey = await cryptoProvider.importEncryptionKey(
      raw.subarray(SIGNING_KEY_SIZE, SIGNING_KEY_SIZE + ENCRYPTION_KEY_SIZE),
    )
    return { signingKey, encryptionKey }
  } catch (err) {
    throw new EncryptionError('Invalid master key: import failed', { cause: err })
  } finally {
    raw.fill(0)
  }
}

/**
 * Generates a fresh master key and returns it as base64url text.
 *
 * @param cryptoProvider - CryptoProvider for randomness (default: WebCryptoCryptoProvider)
 */
export function generateMasterKey(
  cryptoProvider: CryptoProvider = new WebCryptoCryptoProvider(),
): string {
  return toBase64Url(cryptoProvider.randomBytes(MASTER_KEY_SIZE))
}
