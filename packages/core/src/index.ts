// @tollgate/core — Public API surface
// Cryptographic primitives and the in-memory token store

// ============================================================
// Types
// ============================================================

export type { CryptoProvider } from './crypto-provider.js'

export type {
  EncryptedBlob,
  SaltedDigest,
  DerivedKey,
  Metadata,
  Scope,
  Token,
} from './types.js'

export type { CipherKeys, MasterKeyInput } from './key-manager.js'

export type { ParsedBlob } from './cipher.js'

export type { HashInput } from './hashing.js'

export type { CryptoPrimitives, CryptoPrimitivesConfig } from './crypto-primitives.js'

export type { TokenStore, TokenStoreConfig } from './token-store.js'

export type { Logger, LogLevel, LogFields, ConsoleLoggerOptions } from './logger.js'

export type { TollgateErrorCode } from './errors.js'

// ============================================================
// Errors
// ============================================================

export {
  TollgateError,
  InvalidParameterError,
  EncryptionError,
  DecryptionError,
  IssuanceError,
} from './errors.js'

// ============================================================
// CryptoProvider
// ============================================================

export { WebCryptoCryptoProvider } from './web-crypto-provider.js'

// ============================================================
// Crypto Primitives
// ============================================================

export { createCryptoPrimitives, rotateKey } from './crypto-primitives.js'

export { generateMasterKey, normalizeMasterKey, importCipherKeys } from './key-manager.js'

export { encryptBlob, decryptBlob, parseBlob, isWithinAge } from './cipher.js'

export { hashData, verifyHash, constantTimeEqual } from './hashing.js'

export { deriveKeyFromPassword } from './key-derivation.js'

// ============================================================
// Token Store
// ============================================================

export { createTokenStore } from './token-store.js'

// ============================================================
// Logging
// ============================================================

export {
  createConsoleLogger,
  noopLogger,
  redactTokenId,
  isLogLevel,
  LOG_LEVELS,
} from './logger.js'

// ============================================================
// Constants
// ============================================================

export {
  BLOB_VERSION,
  BLOB_HEADER_SIZE,
  BLOB_MIN_SIZE,
  IV_SIZE,
  MAC_SIZE,
  MASTER_KEY_SIZE,
  DIGEST_SIZE,
  PBKDF2_ITERATIONS,
  DEFAULT_SALT_SIZE,
  DEFAULT_SECRET_SIZE,
  DEFAULT_SWEEP_INTERVAL_MS,
  MAX_CLOCK_SKEW_SECONDS,
} from './types.js'

// ============================================================
// Encoding Utilities
// ============================================================

export { toBase64Url, fromBase64Url, toHex, toArrayBuffer } from './encoding.js'
