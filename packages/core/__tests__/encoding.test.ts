import { describe, it, expect } from 'vitest'
import {
  toBase64Url,
  fromBase64Url,
  toHex,
  utf8Encode,
  utf8Decode,
  writeUint64BE,
  readUint64BE,
  toArrayBuffer,
  concatBuffers,
} from '../src/encoding.js'

describe('encoding', () => {
  describe('toBase64Url / fromBase64Url', () => {
    it('should round-trip empty buffer', () => {
      const buf = new Uint8Array(0)
      expect(toBase64Url(buf)).toBe('')
      expect(fromBase64Url('')).toEqual(buf)
    })

    it('should round-trip a 73-byte buffer (minimum blob size)', () => {
      const buf = new Uint8Array(73)
      globalThis.crypto.getRandomValues(buf)
      expect(fromBase64Url(toBase64Url(buf))).toEqual(buf)
    })

    it('should decode known base64url string', () => {
      // "Hello" in base64url
      const decoded = fromBase64Url('SGVsbG8')
      expect(new TextDecoder().decode(decoded)).toBe('Hello')
    })

    it('should accept padded input', () => {
      const decoded = fromBase64Url('SGVsbG8=')
      expect(new TextDecoder().decode(decoded)).toBe('Hello')
    })

    it('should handle base64url with - and _ characters', () => {
      // [0xfb, 0xff, 0xfe] is "+//+" in standard base64, "-__-" in base64url
      const buf = new Uint8Array([0xfb, 0xff, 0xfe])
      const encoded = toBase64Url(buf)
      expect(encoded).toBe('-__-')
      expect(fromBase64Url(encoded)).toEqual(buf)
    })

    it('should strip padding', () => {
      expect(toBase64Url(new Uint8Array([0xff]))).toBe('_w')
    })

    it('should throw on invalid base64url input', () => {
      expect(() => fromBase64Url('!!!invalid!!!')).toThrow()
    })

    it('should reject standard base64 characters', () => {
      expect(() => fromBase64Url('+//+')).toThrow()
    })
  })

  describe('toHex', () => {
    it('should encode each byte as two lowercase characters', () => {
      expect(toHex(new Uint8Array([0xfb, 0xff, 0xfe, 0x00, 0x0a]))).toBe('fbfffe000a')
    })

    it('should encode empty input as empty string', () => {
      expect(toHex(new Uint8Array(0))).toBe('')
    })
  })

  describe('utf8Encode / utf8Decode', () => {
    it('should round-trip non-ASCII text', () => {
      const text = 'grüße, 世界'
      expect(utf8Decode(utf8Encode(text))).toBe(text)
    })

    it('should reject invalid UTF-8', () => {
      expect(() => utf8Decode(new Uint8Array([0xc3, 0x28]))).toThrow()
    })
  })

  describe('writeUint64BE / readUint64BE', () => {
    it('should round-trip a current timestamp in seconds', () => {
      const buf = new Uint8Array(8)
      writeUint64BE(buf, 1_760_000_000, 0)
      expect(readUint64BE(buf, 0)).toBe(1_760_000_000)
    })

    it('should write big-endian', () => {
      const buf = new Uint8Array(8)
      writeUint64BE(buf, 0x0102, 0)
      expect(Array.from(buf)).toEqual([0, 0, 0, 0, 0, 0, 1, 2])
    })

    it('should handle values above 32 bits', () => {
      const buf = new Uint8Array(10)
      writeUint64BE(buf, 2 ** 40 + 5, 2)
      expect(readUint64BE(buf, 2)).toBe(2 ** 40 + 5)
    })
  })

  describe('toArrayBuffer', () => {
    it('should copy only the viewed bytes', () => {
      const backing = new Uint8Array([1, 2, 3, 4, 5])
      const view = backing.subarray(1, 3)
      const buffer = toArrayBuffer(view)
      expect(buffer.byteLength).toBe(2)
      expect(Array.from(new Uint8Array(buffer))).toEqual([2, 3])
    })
  })

  describe('concatBuffers', () => {
    it('should concatenate in order', () => {
      const result = concatBuffers(new Uint8Array([1]), new Uint8Array([]), new Uint8Array([2, 3]))
      expect(Array.from(result)).toEqual([1, 2, 3])
    })
  })
})
