import { describe, it, expect } from 'vitest'
import { WebCryptoCryptoProvider } from '../src/web-crypto-provider.js'
import { generateMasterKey, importCipherKeys, normalizeMasterKey } from '../src/key-manager.js'
import { EncryptionError } from '../src/errors.js'
import { fromBase64Url, toBase64Url } from '../src/encoding.js'

describe('key-manager', () => {
  const provider = new WebCryptoCryptoProvider()

  describe('normalizeMasterKey', () => {
    it('should accept 32 raw bytes and return a copy', () => {
      const input = new Uint8Array(32).fill(3)
      const normalized = normalizeMasterKey(input)
      expect(normalized).toEqual(input)

      input[0] = 99
      expect(normalized[0]).toBe(3)
    })

    it('should decode base64url text', () => {
      const raw = new Uint8Array(32).fill(0xfe)
      expect(normalizeMasterKey(toBase64Url(raw))).toEqual(raw)
    })

    it('should accept padded base64url text', () => {
      const raw = new Uint8Array(32).fill(1)
      expect(normalizeMasterKey(`${toBase64Url(raw)}=`)).toEqual(raw)
    })

    it('should reject a 16-byte key with the observed length', () => {
      expect(() => normalizeMasterKey(new Uint8Array(16))).toThrow(
        'Invalid master key: expected 32 bytes, got 16 bytes',
      )
    })

    it('should reject a 33-byte key', () => {
      expect(() => normalizeMasterKey(new Uint8Array(33))).toThrow(EncryptionError)
    })

    it('should reject text that is not base64url', () => {
      expect(() => normalizeMasterKey('not/base64+url')).toThrow(
        'Invalid master key: not base64url',
      )
    })
  })

  describe('importCipherKeys', () => {
    it('should import an HMAC key and an AES-CBC key', async () => {
      const keys = await importCipherKeys(provider, new Uint8Array(32).fill(5))
      expect(keys.signingKey.algorithm.name).toBe('HMAC')
      expect(keys.encryptionKey.algorithm.name).toBe('AES-CBC')
      expect(keys.signingKey.extractable).toBe(false)
      expect(keys.encryptionKey.extractable).toBe(false)
    })

    it('should leave the caller buffer untouched', async () => {
      const input = new Uint8Array(32).fill(5)
      await importCipherKeys(provider, input)
      expect(input.every((b) => b === 5)).toBe(true)
    })

    it('should throw EncryptionError for a malformed key', async () => {
      await expect(importCipherKeys(provider, 'short')).rejects.toThrow(EncryptionError)
    })
  })

  describe('generateMasterKey', () => {
    it('should return 43 base64url characters encoding 32 bytes', () => {
      const key = generateMasterKey(provider)
      expect(key).toMatch(/^[A-Za-z0-9_-]{43}$/)
      expect(fromBase64Url(key).length).toBe(32)
    })

    it('should return a different key every call', () => {
      expect(generateMasterKey(provider)).not.toBe(generateMasterKey(provider))
    })
  })
})
