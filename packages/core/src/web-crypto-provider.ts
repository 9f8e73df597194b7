// @tollgate/core — WebCrypto-based CryptoProvider implementation

import type { CryptoProvider } from './crypto-provider.js'

/** crypto.getRandomValues refuses requests above 64 KiB */
const MAX_RANDOM_CHUNK = 65_536

/**
 * Default CryptoProvider implementation using the WebCrypto API.
 *
 * - HMAC-SHA256 for sign/verify (full 256-bit, NO truncation)
 * - AES-CBC with PKCS#7 padding for encryption
 * - PBKDF2-HMAC-SHA256 for password key derivation
 * - crypto.getRandomValues for secure randomness
 * - SHA-256 for hashing
 *
 * Zero external dependencies. Works on Node 20 without flags.
 */
export class WebCryptoCryptoProvider implements CryptoProvider {
  async sign(key: CryptoKey, data: Uint8Array): Promise<ArrayBuffer> {
    return crypto.subtle.sign('HMAC', key, data as Uint8Array<ArrayBuffer>)
  }

  /**
   * Verifies an HMAC-SHA256 signature using WebCrypto.
   * Inherently constant-time via crypto.subtle.verify.
   */
  async verify(key: CryptoKey, signature: ArrayBuffer, data: Uint8Array): Promise<boolean> {
    return crypto.subtle.verify('HMAC', key, signature, data as Uint8Array<ArrayBuffer>)
  }

  async importSigningKey(raw: Uint8Array): Promise<CryptoKey> {
    return crypto.subtle.importKey(
      'raw',
      raw as Uint8Array<ArrayBuffer>,
      { name: 'HMAC', hash: 'SHA-256' },
      false,
      ['sign', 'verify'],
    )
  }

  async importEncryptionKey(raw: Uint8Array): Promise<CryptoKey> {
    return crypto.subtle.importKey('raw', raw as Uint8Array<ArrayBuffer>, { name: 'AES-CBC' }, false, [
      'encrypt',
      'decrypt',
    ])
  }

  async encrypt(key: CryptoKey, iv: Uint8Array, plaintext: Uint8Array): Promise<ArrayBuffer> {
    return crypto.subtle.encrypt(
      { name: 'AES-CBC', iv: iv as Uint8Array<ArrayBuffer> },
      key,
      plaintext as Uint8Array<ArrayBuffer>,
    )
  }

  async decrypt(key: CryptoKey, iv: Uint8Array, ciphertext: Uint8Array): Promise<ArrayBuffer> {
    return crypto.subtle.decrypt(
      { name: 'AES-CBC', iv: iv as Uint8Array<ArrayBuffer> },
      key,
      ciphertext as Uint8Array<ArrayBuffer>,
    )
  }

  /**
   * Derives `length` bytes with PBKDF2-HMAC-SHA256.
   *
   * The password is imported as PBKDF2 base key material, then stretched
   * with `deriveBits`; the output is raw bytes, not a CryptoKey.
   */
  async pbkdf2(
    password: Uint8Array,
    salt: Uint8Array,
    iterations: number,
    length: number,
  ): Promise<ArrayBuffer> {
    const baseKey = await crypto.subtle.importKey(
      'raw',
      password as Uint8Array<ArrayBuffer>,
      { name: 'PBKDF2' },
      false,
      ['deriveBits'],
    )

    return crypto.subtle.deriveBits(
      {
        name: 'PBKDF2',
        hash: 'SHA-256',
        salt: salt as Uint8Array<ArrayBuffer>,
        iterations,
      },
      baseKey,
      length * 8,
    )
  }

  /**
   * Generates cryptographically secure random bytes via crypto.getRandomValues.
   * Fills in 64 KiB chunks. NEVER uses Math.random.
   */
  randomBytes(length: number): Uint8Array {
    const buffer = new Uint8Array(length)
    for (let offset = 0; offset < length; offset += MAX_RANDOM_CHUNK) {
      crypto.getRandomValues(buffer.subarray(offset, Math.min(offset + MAX_RANDOM_CHUNK, length)))
    }
    return buffer
  }

  async hash(data: Uint8Array): Promise<ArrayBuffer> {
    return crypto.subtle.digest('SHA-256', data as Uint8Array<ArrayBuffer>)
  }
}
