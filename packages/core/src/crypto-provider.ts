// @tollgate/core — CryptoProvider abstraction

/**
 * CryptoProvider abstraction for all cryptographic operations.
 *
 * All crypto operations in @tollgate/core go through this interface;
 * never call `crypto.subtle` directly from cipher, hashing or key code.
 *
 * Default implementation: WebCryptoCryptoProvider (ships with core, zero deps).
 */
export interface CryptoProvider {
  /**
   * Signs data with HMAC-SHA256.
   * Returns the full 256-bit MAC (NO truncation).
   */
  sign(key: CryptoKey, data: Uint8Array): Promise<ArrayBuffer>

  /**
   * Verifies an HMAC-SHA256 signature.
   * MUST be constant-time (crypto.subtle.verify is inherently constant-time).
   */
  verify(key: CryptoKey, signature: ArrayBuffer, data: Uint8Array): Promise<boolean>

  /** Imports raw bytes as a non-extractable HMAC-SHA256 key. */
  importSigningKey(raw: Uint8Array): Promise<CryptoKey>

  /** Imports raw bytes as a non-extractable AES-CBC key. */
  importEncryptionKey(raw: Uint8Array): Promise<CryptoKey>

  /** AES-CBC encryption with PKCS#7 padding. */
  encrypt(key: CryptoKey, iv: Uint8Array, plaintext: Uint8Array): Promise<ArrayBuffer>

  /**
   * AES-CBC decryption.
   * Rejects when the padding is invalid.
   */
  decrypt(key: CryptoKey, iv: Uint8Array, ciphertext: Uint8Array): Promise<ArrayBuffer>

  /**
   * PBKDF2-HMAC-SHA256.
   *
   * @param password - Password bytes
   * @param salt - Salt bytes
   * @param iterations - Iteration count (work factor)
   * @param length - Output length in bytes
   */
  pbkdf2(
    password: Uint8Array,
    salt: Uint8Array,
    iterations: number,
    length: number,
  ): Promise<ArrayBuffer>

  /**
   * Generates cryptographically secure random bytes.
   * Uses crypto.getRandomValues (NOT Math.random).
   */
  randomBytes(length: number): Uint8Array

  /**
   * Computes SHA-256 hash of the input data.
   * Returns the full 256-bit (32-byte) digest.
   */
  hash(data: Uint8Array): Promise<ArrayBuffer>
}
