// @tollgate/core — Crypto Primitives instance (owns one master key)

import type { CryptoProvider } from './crypto-provider.js'
import type { DerivedKey, EncryptedBlob, SaltedDigest } from './types.js'
import { DEFAULT_SECRET_SIZE } from './types.js'
import type { CipherKeys, MasterKeyInput } from './key-manager.js'
import { generateMasterKey, importCipherKeys, normalizeMasterKey } from './key-manager.js'
import type { HashInput } from './hashing.js'
import { hashData, verifyHash } from './hashing.js'
import { decryptBlob, encryptBlob } from './cipher.js'
import { deriveKeyFromPassword } from './key-derivation.js'
import { DecryptionError, InvalidParameterError } from './errors.js'
import { toBase64Url, toHex, utf8Decode, utf8Encode } from './encoding.js'
import { WebCryptoCryptoProvider } from './web-crypto-provider.js'

/**
 * Configuration for `createCryptoPrimitives`.
 */
export interface CryptoPrimitivesConfig {
  /** 32-byte master key, raw or base64url (default: freshly generated) */
  readonly masterKey?: MasterKeyInput | undefined
  /** Custom CryptoProvider implementation (default: WebCryptoCryptoProvider) */
  readonly cryptoProvider?: CryptoProvider | undefined
  /** Clock in epoch milliseconds (default: Date.now) */
  readonly now?: (() => number) | undefined
}

/**
 * Cryptographic operations bound to one master key.
 *
 * The key is fixed at construction and shared read-only by every caller.
 */
export interface CryptoPrimitives {
  /** `length` secure random bytes (default 32) */
  randomBytes(length?: number): Uint8Array

  /** Random bytes as lowercase hex (2 characters per byte) */
  randomHex(length?: number): string

  /** Random bytes as base64url without padding */
  randomUrlSafe(length?: number): string

  /** Authenticated encryption with a fresh IV and an embedded timestamp */
  encrypt(plaintext: Uint8Array): Promise<EncryptedBlob>

  /** `encrypt` over the UTF-8 bytes of a string */
  encryptString(plaintext: string): Promise<EncryptedBlob>

  /** Inverse of `encrypt`; optionally rejects blobs older than `maxAgeSeconds` */
  decrypt(blob: string, maxAgeSeconds?: number): Promise<Uint8Array>

  /** `decrypt` followed by strict UTF-8 decoding */
  decryptString(blob: string, maxAgeSeconds?: number): Promise<string>

  /** Salted SHA-256; generates a 16-byte salt when none is given */
  hash(data: HashInput, salt?: Uint8Array): Promise<SaltedDigest>

  /** Constant-time check of `data` against a stored digest and salt */
  verify(data: HashInput, expectedDigest: Uint8Array, salt: Uint8Array): Promise<boolean>

  /** PBKDF2-HMAC-SHA256 (480k iterations) → 32-byte key usable as a master key */
  deriveKey(password: string, salt?: Uint8Array): Promise<DerivedKey>

  /** The master key as base64url, so a host can persist a generated key */
  exportMasterKey(): string
}

function assertLength(length: number): void {
  if (!Number.isInteger(length) || length <= 0) {
    throw new InvalidParameterError(
      `Random length must be a positive integer, got ${String(length)}`,
    )
  }
}

/**
 * Creates a Crypto Primitives instance.
 *
 * Invalid key material is rejected here, not on first use.
 *
 * @param config - Optional key, provider and clock
 * @throws {EncryptionError} If `masterKey` is not 32 bytes
 *
 * @example
 * ```typescript
 * const primitives = await createCryptoPrimitives({ masterKey: process.env.TOLLGATE_MASTER_KEY })
 * const blob = await primitives.encryptString('hello')
 * const text = await primitives.decryptString(blob, 60)
 * ```
 */
export async function createCryptoPrimitives(
  config?: CryptoPrimitivesConfig,
): Promise<CryptoPrimitives> {
  const cryptoProvider: CryptoProvider = config?.cryptoProvider ?? new WebCryptoCryptoProvider()
  const now = config?.now ?? Date.now

  const masterKey = normalizeMasterKey(config?.masterKey ?? generateMasterKey(cryptoProvider))
  const keys: CipherKeys = await importCipherKeys(cryptoProvider, masterKey)

  function randomBytes(length: number = DEFAULT_SECRET_SIZE): Uint8Array {
    assertLength(length)
    return cryptoProvider.randomBytes(length)
  }

  const instance: CryptoPrimitives = {
    randomBytes,

    randomHex(length: number = DEFAULT_SECRET_SIZE): string {
      return toHex(randomBytes(length))
    },

    randomUrlSafe(length: number = DEFAULT_SECRET_SIZE): string {
      return toBase64Url(randomBytes(length))
    },

    async encrypt(plaintext: Uint8Array): Promise<EncryptedBlob> {
      return encryptBlob(cryptoProvider, keys, plaintext, now())
    },

    async encryptString(plaintext: string): Promise<EncryptedBlob> {
      return encryptBlob(cryptoProvider, keys, utf8Encode(plaintext), now())
    },

    async decrypt(blob: string, maxAgeSeconds?: number): Promise<Uint8Array> {
      return decryptBlob(cryptoProvider, keys, blob, maxAgeSeconds, now())
    },

    async decryptString(blob: string, maxAgeSeconds?: number): Promise<string> {
      const bytes = await decryptBlob(cryptoProvider, keys, blob, maxAgeSeconds, now())
      try {
        return utf8Decode(bytes)
      } catch (err) {
        throw new DecryptionError({ cause: err })
      }
    },

    async hash(data: HashInput, salt?: Uint8Array): Promise<SaltedDigest> {
      return hashData(cryptoProvider, data, salt)
    },

    async verify(data: HashInput, expectedDigest: Uint8Array, salt: Uint8Array): Promise<boolean> {
      return verifyHash(cryptoProvider, data, expectedDigest, salt)
    },

    async deriveKey(password: string, salt?: Uint8Array): Promise<DerivedKey> {
      return deriveKeyFromPassword(cryptoProvider, password, salt)
    },

    exportMasterKey(): string {
      return toBase64Url(masterKey)
    },
  }

  return instance
}

/**
 * Re-encrypts a blob under a new master key.
 *
 * The blob is authenticated and decrypted under `oldKey` (a failure surfaces
 * as an unchanged `DecryptionError`), then encrypted under `newKey` with a
 * fresh IV and timestamp.
 *
 * @param oldKey - Key the blob was produced with
 * @param newKey - Key to re-encrypt under
 * @param blob - Blob to rotate
 * @param cryptoProvider - CryptoProvider (default: WebCryptoCryptoProvider)
 * @throws {EncryptionError} If either key is malformed or re-encryption fails
 * @throws {DecryptionError} If `oldKey` cannot decrypt the blob
 */
export async function rotateKey(
  oldKey: MasterKeyInput,
  newKey: MasterKeyInput,
  blob: string,
  cryptoProvider: CryptoProvider = new WebCryptoCryptoProvider(),
): Promise<EncryptedBlob> {
  const oldKeys = await importCipherKeys(cryptoProvider, oldKey)
  const newKeys = await importCipherKeys(cryptoProvider, newKey)
  const plaintext = await decryptBlob(cryptoProvider, oldKeys, blob)
  return encryptBlob(cryptoProvider, newKeys, plaintext)
}
