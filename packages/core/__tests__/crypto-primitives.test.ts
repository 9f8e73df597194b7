import { describe, it, expect, beforeAll } from 'vitest'
import { createCryptoPrimitives, rotateKey } from '../src/crypto-primitives.js'
import type { CryptoPrimitives } from '../src/crypto-primitives.js'
import { generateMasterKey } from '../src/key-manager.js'
import { DecryptionError, EncryptionError, InvalidParameterError } from '../src/errors.js'
import { fromBase64Url, toBase64Url } from '../src/encoding.js'

const MASTER_KEY = toBase64Url(new Uint8Array(32).fill(0x42))

describe('createCryptoPrimitives', () => {
  let primitives: CryptoPrimitives

  beforeAll(async () => {
    primitives = await createCryptoPrimitives({ masterKey: MASTER_KEY })
  })

  describe('construction', () => {
    it('should reject a master key of the wrong size immediately', async () => {
      await expect(
        createCryptoPrimitives({ masterKey: new Uint8Array(16) }),
      ).rejects.toThrow(EncryptionError)
    })

    it('should generate a master key when none is given', async () => {
      const generated = await createCryptoPrimitives()
      expect(fromBase64Url(generated.exportMasterKey()).length).toBe(32)
    })

    it('should export the configured master key unchanged', () => {
      expect(primitives.exportMasterKey()).toBe(MASTER_KEY)
    })

    it('should let a host persist and reload a generated key', async () => {
      const first = await createCryptoPrimitives()
      const blob = await first.encryptString('persisted')
      const second = await createCryptoPrimitives({ masterKey: first.exportMasterKey() })
      expect(await second.decryptString(blob)).toBe('persisted')
    })
  })

  describe('randomBytes / randomHex / randomUrlSafe', () => {
    it('should default to 32 bytes', () => {
      expect(primitives.randomBytes().length).toBe(32)
      expect(primitives.randomHex()).toMatch(/^[0-9a-f]{64}$/)
      expect(primitives.randomUrlSafe()).toMatch(/^[A-Za-z0-9_-]{43}$/)
    })

    it('should honour an explicit length', () => {
      expect(primitives.randomBytes(1).length).toBe(1)
      expect(primitives.randomHex(4)).toHaveLength(8)
      expect(fromBase64Url(primitives.randomUrlSafe(48)).length).toBe(48)
    })

    it('should reject zero, negative and fractional lengths', () => {
      expect(() => primitives.randomBytes(0)).toThrow(InvalidParameterError)
      expect(() => primitives.randomHex(-1)).toThrow(InvalidParameterError)
      expect(() => primitives.randomUrlSafe(1.5)).toThrow(
        'Random length must be a positive integer, got 1.5',
      )
    })
  })

  describe('encrypt / decrypt', () => {
    it('should round-trip empty input', async () => {
      const blob = await primitives.encrypt(new Uint8Array(0))
      expect((await primitives.decrypt(blob)).length).toBe(0)
    })

    it('should round-trip 1 MB of random data', async () => {
      const plaintext = primitives.randomBytes(1024 * 1024)
      const blob = await primitives.encrypt(plaintext)
      const decrypted = await primitives.decrypt(blob)
      expect(decrypted.length).toBe(plaintext.length)
      expect(Buffer.from(decrypted).equals(Buffer.from(plaintext))).toBe(true)
    })

    it('should produce different blobs for the same plaintext', async () => {
      const plaintext = new TextEncoder().encode('same input')
      const a = await primitives.encrypt(plaintext)
      const b = await primitives.encrypt(plaintext)
      expect(a).not.toBe(b)
      expect(await primitives.decrypt(a)).toEqual(plaintext)
      expect(await primitives.decrypt(b)).toEqual(plaintext)
    })

    it('should fail under a different master key', async () => {
      const other = await createCryptoPrimitives()
      const blob = await primitives.encryptString('secret')
      await expect(other.decrypt(blob)).rejects.toThrow(DecryptionError)
    })

    it('should enforce maxAgeSeconds against the injected clock', async () => {
      let clock = 1_700_000_000_000
      const timed = await createCryptoPrimitives({ masterKey: MASTER_KEY, now: () => clock })

      const blob = await timed.encryptString('short-lived')
      clock += 10_000
      expect(await timed.decryptString(blob, 10)).toBe('short-lived')

      clock += 1_000
      await expect(timed.decryptString(blob, 10)).rejects.toThrow('Invalid or expired token')
    })
  })

  describe('encryptString / decryptString', () => {
    it('should round-trip unicode text', async () => {
      const text = 'grüße, 世界 🎟'
      expect(await primitives.decryptString(await primitives.encryptString(text))).toBe(text)
    })

    it('should raise DecryptionError for plaintext that is not UTF-8', async () => {
      const blob = await primitives.encrypt(new Uint8Array([0xc3, 0x28]))
      await expect(primitives.decryptString(blob)).rejects.toThrow(DecryptionError)
    })
  })

  describe('hash / verify', () => {
    it('should be deterministic for a fixed salt', async () => {
      const salt = new Uint8Array(16).fill(1)
      const a = await primitives.hash('data', salt)
      const b = await primitives.hash('data', salt)
      expect(a.digest).toEqual(b.digest)
    })

    it('should change with the salt', async () => {
      const a = await primitives.hash('data', new Uint8Array(16).fill(1))
      const b = await primitives.hash('data', new Uint8Array(16).fill(2))
      expect(a.digest).not.toEqual(b.digest)
    })

    it('should verify only the exact data, digest and salt', async () => {
      const { digest, salt } = await primitives.hash('data')
      expect(await primitives.verify('data', digest, salt)).toBe(true)
      expect(await primitives.verify('Data', digest, salt)).toBe(false)
      expect(await primitives.verify('data', digest.map((b, i) => (i === 0 ? b ^ 1 : b)), salt)).toBe(
        false,
      )
      expect(await primitives.verify('data', digest, salt.map((b) => b ^ 0xff))).toBe(false)
    })
  })

  describe('deriveKey', () => {
    it(
      'should be deterministic and produce a usable master key',
      async () => {
        const salt = new Uint8Array(16).fill(7)
        const a = await primitives.deriveKey('correct horse', salt)
        const b = await primitives.deriveKey('correct horse', salt)
        expect(a.key.length).toBe(32)
        expect(a.key).toEqual(b.key)
        expect(a.salt).toBe(salt)

        const derived = await createCryptoPrimitives({ masterKey: a.key })
        expect(await derived.decryptString(await derived.encryptString('ok'))).toBe('ok')
      },
      30_000,
    )

    it(
      'should generate a 16-byte salt when none is given',
      async () => {
        const { key, salt } = await primitives.deriveKey('correct horse')
        expect(salt.length).toBe(16)
        expect(key.length).toBe(32)
      },
      30_000,
    )
  })
})

describe('rotateKey', () => {
  it('should re-encrypt a blob under the new key', async () => {
    const oldKey = generateMasterKey()
    const newKey = generateMasterKey()
    const oldPrimitives = await createCryptoPrimitives({ masterKey: oldKey })
    const newPrimitives = await createCryptoPrimitives({ masterKey: newKey })

    const blob = await oldPrimitives.encryptString('rotate me')
    const rotated = await rotateKey(oldKey, newKey, blob)

    expect(await newPrimitives.decryptString(rotated)).toBe('rotate me')
    await expect(oldPrimitives.decrypt(rotated)).rejects.toThrow(DecryptionError)
  })

  it('should propagate DecryptionError when the old key does not match', async () => {
    const primitives = await createCryptoPrimitives()
    const blob = await primitives.encryptString('x')
    await expect(rotateKey(generateMasterKey(), generateMasterKey(), blob)).rejects.toThrow(
      DecryptionError,
    )
  })

  it('should reject a malformed new key', async () => {
    const primitives = await createCryptoPrimitives()
    const blob = await primitives.encryptString('x')
    await expect(rotateKey(primitives.exportMasterKey(), 'short', blob)).rejects.toThrow(
      EncryptionError,
    )
  })
})
