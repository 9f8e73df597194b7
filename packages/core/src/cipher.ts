// @tollgate/core — Authenticated encryption (AES-128-CBC + HMAC-SHA256, timestamped)

import type { CryptoProvider } from './crypto-provider.js'
import type { CipherKeys } from './key-manager.js'
import type { EncryptedBlob } from './types.js'
import {
  BLOB_HEADER_SIZE,
  BLOB_MIN_SIZE,
  BLOB_OFFSETS,
  BLOB_VERSION,
  BLOCK_SIZE,
  IV_SIZE,
  MAC_SIZE,
  MAX_CLOCK_SKEW_SECONDS,
} from './types.js'
import { DecryptionError, EncryptionError, InvalidParameterError } from './errors.js'
import {
  concatBuffers,
  fromBase64Url,
  readUint64BE,
  toArrayBuffer,
  toBase64Url,
  writeUint64BE,
} from './encoding.js'

/** Parsed blob (extracted from wire format) */
export interface ParsedBlob {
  readonly version: number
  /** Creation time in epoch seconds */
  readonly timestamp: number
  readonly iv: Uint8Array
  readonly ciphertext: Uint8Array
  readonly mac: Uint8Array
  /** Every byte covered by the MAC: version | ts | iv | ciphertext */
  readonly signed: Uint8Array
}

/**
 * Encrypts plaintext into a self-describing, authenticated blob.
 *
 * Steps:
 * 1. Draw a fresh 16-byte IV
 * 2. AES-128-CBC encrypt (PKCS#7 padding)
 * 3. Assemble header: version | ts | iv
 * 4. MAC: HMAC-SHA256(signingKey, header | ciphertext)
 * 5. Encode: base64url(header | ciphertext | mac)
 *
 * Blob wire format:
 * ```
 * [ version:1 ][ ts:8 ][ iv:16 ][ ciphertext:16n ][ mac:32 ]
 * ```
 *
 * @param cryptoProvider - CryptoProvider for crypto operations
 * @param keys - Imported signing and encryption keys
 * @param plaintext - Bytes to protect (may be empty)
 * @param now - Current timestamp in milliseconds
 * @throws {EncryptionError} If any crypto step fails
 */
export async function encryptBlob(
  cryptoProvider: CryptoProvider,
  keys: CipherKeys,
  plaintext: Uint8Array,
  now: number = Date.now(),
): Promise<EncryptedBlob> {
  try {
    const iv = cryptoProvider.randomBytes(IV_SIZE)
    const ciphertext = new Uint8Array(await cryptoProvider.encrypt(keys.encryptionKey, iv, plaintext))

    const header = new Uint8Array(BLOB_HEADER_SIZE)
    header[BLOB_OFFSETS.VERSION] = BLOB_VERSION
    writeUint64BE(header, Math.floor(now / 1000), BLOB_OFFSETS.TIMESTAMP)
    header.set(iv, BLOB_OFFSETS.IV)

    const signed = concatBuffers(header, ciphertext)
    const mac = new Uint8Array(await cryptoProvider.sign(keys.signingKey, signed))

    return toBase64Url(concatBuffers(signed, mac)) as EncryptedBlob
  } catch (err) {
    throw new EncryptionError('Encryption failed', { cause: err })
  }
}

/**
 * Parses a blob string into its fields.
 *
 * Checks only the structure (encoding, version, length, block alignment);
 * authenticity is decided by `decryptBlob`.
 *
 * @returns ParsedBlob or null if the blob cannot be parsed
 */
export function parseBlob(blob: string): ParsedBlob | null {
  let raw: Uint8Array
  try {
    raw = fromBase64Url(blob)
  } catch {
    return null
  }

  if (raw.length < BLOB_MIN_SIZE) return null
  if ((raw.length - BLOB_HEADER_SIZE - MAC_SIZE) % BLOCK_SIZE !== 0) return null

  const version = raw[BLOB_OFFSETS.VERSION]
  if (version !== BLOB_VERSION) return null

  const macOffset = raw.length - MAC_SIZE
  return {
    version,
    timestamp: readUint64BE(raw, BLOB_OFFSETS.TIMESTAMP),
    iv: raw.slice(BLOB_OFFSETS.IV, BLOB_OFFSETS.IV + IV_SIZE),
    ciphertext: raw.slice(BLOB_OFFSETS.CIPHERTEXT, macOffset),
    mac: raw.slice(macOffset),
    signed: raw.slice(0, macOffset),
  }
}

/**
 * Checks a blob timestamp against an age bound.
 *
 * A blob is too old when `ts + maxAge < now`, and suspicious when stamped
 * more than 60 s in the future.
 *
 * @param timestamp - Blob creation time (seconds)
 * @param maxAgeSeconds - Maximum accepted age
 * @param nowSeconds - Current time (seconds)
 */
export function isWithinAge(timestamp: number, maxAgeSeconds: number, nowSeconds: number): boolean {
  if (timestamp + maxAgeSeconds < nowSeconds) return false
  if (nowSeconds + MAX_CLOCK_SKEW_SECONDS < timestamp) return false
  return true
}

/**
 * Decrypts and authenticates a blob.
 *
 * Order: parse → MAC verify (constant-time) → age check → AES decrypt.
 * Every failure throws the same `DecryptionError`, so a caller cannot tell a
 * wrong key from tampering or from an expired blob.
 *
 * @param cryptoProvider - CryptoProvider for crypto operations
 * @param keys - Imported signing and encryption keys
 * @param blob - Blob produced by `encryptBlob`
 * @param maxAgeSeconds - Optional age bound
 * @param now - Current timestamp in milliseconds
 * @throws {InvalidParameterError} If `maxAgeSeconds` is negative or not finite
 * @throws {DecryptionError} On any failure
 */
export async function decryptBlob(
  cryptoProvider: CryptoProvider,
  keys: CipherKeys,
  blob: string,
  maxAgeSeconds?: number,
  now: number = Date.now(),
): Promise<Uint8Array> {
  if (maxAgeSeconds !== undefined && !(Number.isFinite(maxAgeSeconds) && maxAgeSeconds >= 0)) {
    throw new InvalidParameterError(
      `maxAgeSeconds must be a finite number >= 0, got ${String(maxAgeSeconds)}`,
    )
  }

  const parsed = parseBlob(blob)
  if (parsed === null) {
    throw new DecryptionError()
  }

  let macOk: boolean
  try {
    macOk = await cryptoProvider.verify(keys.signingKey, toArrayBuffer(parsed.mac), parsed.signed)
  } catch (err) {
    throw new DecryptionError({ cause: err })
  }
  if (!macOk) {
    throw new DecryptionError()
  }

  if (
    maxAgeSeconds !== undefined &&
    !isWithinAge(parsed.timestamp, maxAgeSeconds, Math.floor(now / 1000))
  ) {
    throw new DecryptionError()
  }

  try {
    return new Uint8Array(
      await cryptoProvider.decrypt(keys.encryptionKey, parsed.iv, parsed.ciphertext),
    )
  } catch (err) {
    throw new DecryptionError({ cause: err })
  }
}
