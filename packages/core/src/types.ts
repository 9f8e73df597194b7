// @tollgate/core — Types, constants, and branded types

// ============================================================
// Branded Types
// ============================================================

declare const ENCRYPTED_BLOB_BRAND: unique symbol

/** Branded string type for authenticated ciphertext produced by `encrypt` */
export type EncryptedBlob = string & { readonly [ENCRYPTED_BLOB_BRAND]: 'TollgateEncryptedBlob' }

// ============================================================
// Blob Structure Constants
// ============================================================

/** Version byte that opens every blob */
export const BLOB_VERSION = 0x80

/** Version field size in bytes */
export const VERSION_SIZE = 1

/** Timestamp size in bytes (uint64 big-endian, seconds) */
export const TIMESTAMP_SIZE = 8

/** AES-CBC initialization vector size in bytes */
export const IV_SIZE = 16

/** AES block size in bytes (ciphertext is always a whole number of blocks) */
export const BLOCK_SIZE = 16

/** MAC size in bytes (HMAC-SHA256, full 256-bit) */
export const MAC_SIZE = 32

/** Header size: version(1) + ts(8) + iv(16) = 25 bytes */
export const BLOB_HEADER_SIZE = VERSION_SIZE + TIMESTAMP_SIZE + IV_SIZE

/** Smallest valid blob: header + one cipher block + mac = 73 bytes */
export const BLOB_MIN_SIZE = BLOB_HEADER_SIZE + BLOCK_SIZE + MAC_SIZE

/** Blob field offsets */
export const BLOB_OFFSETS = {
  VERSION: 0,
  TIMESTAMP: VERSION_SIZE,
  IV: VERSION_SIZE + TIMESTAMP_SIZE,
  CIPHERTEXT: BLOB_HEADER_SIZE,
} as const

/** Tolerated clock skew for blobs stamped in the future (seconds) */
export const MAX_CLOCK_SKEW_SECONDS = 60

// ============================================================
// Key Material Constants
// ============================================================

/** Master key size in bytes: signing(16) + encryption(16) */
export const MASTER_KEY_SIZE = 32

/** Half of the master key used for HMAC-SHA256 */
export const SIGNING_KEY_SIZE = 16

/** Half of the master key used for AES-128-CBC */
export const ENCRYPTION_KEY_SIZE = 16

/** SHA-256 digest size in bytes */
export const DIGEST_SIZE = 32

/** PBKDF2-HMAC-SHA256 iteration count */
export const PBKDF2_ITERATIONS = 480_000

/** Default salt size in bytes */
export const DEFAULT_SALT_SIZE = 16

/** Default random secret size in bytes */
export const DEFAULT_SECRET_SIZE = 32

// ============================================================
// Crypto Result Types
// ============================================================

/** A SHA-256 digest with the salt that produced it */
export interface SaltedDigest {
  readonly digest: Uint8Array
  readonly salt: Uint8Array
}

/** A password-derived key with the salt that produced it */
export interface DerivedKey {
  readonly key: Uint8Array
  readonly salt: Uint8Array
}

// ============================================================
// Token Types
// ============================================================

/** String-keyed bag of caller-supplied values */
export type Metadata = Readonly<Record<string, unknown>>

/** The resource and action set a token authorizes */
export interface Scope {
  readonly resource: string
  readonly actions: readonly string[]
  readonly metadata: Metadata
}

/** Stored token record (timestamps in epoch milliseconds) */
export interface Token {
  readonly tokenId: string
  readonly scope: Scope
  readonly createdAt: number
  readonly expiresAt: number
  readonly metadata: Metadata
}

// ============================================================
// Default Configuration Constants
// ============================================================

/** Default background sweep interval in milliseconds (60 seconds) */
export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 1000
