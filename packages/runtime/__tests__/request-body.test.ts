import { describe, it, expect } from 'vitest'
import {
  isPlainObject,
  normalizePath,
  parseIssueRequest,
  parseValidateRequest,
  readJsonBody,
} from '../src/request-body.js'

describe('request-body', () => {
  describe('normalizePath', () => {
    it('should strip trailing slashes', () => {
      expect(normalizePath('/tokens/')).toBe('/tokens')
      expect(normalizePath('/tokens///')).toBe('/tokens')
    })

    it('should keep the root path', () => {
      expect(normalizePath('')).toBe('/')
      expect(normalizePath('/')).toBe('/')
      expect(normalizePath('///')).toBe('/')
    })

    it('should not change case', () => {
      expect(normalizePath('/Tokens/Stats')).toBe('/Tokens/Stats')
    })
  })

  describe('isPlainObject', () => {
    it('should accept object literals and null-prototype objects', () => {
      expect(isPlainObject({})).toBe(true)
      expect(isPlainObject(Object.create(null))).toBe(true)
    })

    it('should reject arrays, null, primitives and class instances', () => {
      expect(isPlainObject([])).toBe(false)
      expect(isPlainObject(null)).toBe(false)
      expect(isPlainObject('x')).toBe(false)
      expect(isPlainObject(new Date())).toBe(false)
    })
  })

  describe('parseIssueRequest', () => {
    it('should fill defaults for actions, metadata and ttlSeconds', () => {
      expect(parseIssueRequest({ scope: { resource: 'reports' } })).toEqual({
        ok: true,
        value: {
          scope: { resource: 'reports', actions: [], metadata: {} },
          ttlSeconds: undefined,
          metadata: {},
        },
      })
    })

    it('should pass every field through', () => {
      const body = {
        scope: { resource: 'reports', actions: ['read'], metadata: { team: 'ops' } },
        ttlSeconds: 60,
        metadata: { requestedBy: 'cli' },
      }
      expect(parseIssueRequest(body)).toEqual({ ok: true, value: body })
    })

    it.each([
      [null, 'Request body must be a JSON object'],
      [[], 'Request body must be a JSON object'],
      [{}, 'scope must be an object'],
      [{ scope: 'reports' }, 'scope must be an object'],
      [{ scope: {} }, 'scope.resource must be a string'],
      [{ scope: { resource: 7 } }, 'scope.resource must be a string'],
      [{ scope: { resource: 'r', actions: 'read' } }, 'scope.actions must be an array of strings'],
      [{ scope: { resource: 'r', actions: [1] } }, 'scope.actions must be an array of strings'],
      [{ scope: { resource: 'r', metadata: [] } }, 'scope.metadata must be an object'],
      [{ scope: { resource: 'r' }, ttlSeconds: '60' }, 'ttlSeconds must be an integer'],
      [{ scope: { resource: 'r' }, ttlSeconds: 1.5 }, 'ttlSeconds must be an integer'],
      [{ scope: { resource: 'r' }, metadata: 'x' }, 'metadata must be an object'],
    ])('should reject %j', (body, error) => {
      expect(parseIssueRequest(body)).toEqual({ ok: false, error })
    })
  })

  describe('parseValidateRequest', () => {
    it('should return the token id', () => {
      expect(parseValidateRequest({ tokenId: 'abc' })).toEqual({ ok: true, value: 'abc' })
    })

    it('should reject a missing, empty or non-string id', () => {
      expect(parseValidateRequest({})).toEqual({ ok: false, error: 'tokenId is required' })
      expect(parseValidateRequest({ tokenId: '' })).toEqual({ ok: false, error: 'tokenId is required' })
      expect(parseValidateRequest({ tokenId: 5 })).toEqual({ ok: false, error: 'tokenId is required' })
      expect(parseValidateRequest(undefined)).toEqual({
        ok: false,
        error: 'Request body must be a JSON object',
      })
    })
  })

  describe('readJsonBody', () => {
    it('should return the parsed body', async () => {
      expect(await readJsonBody(async () => ({ a: 1 }))).toEqual({ a: 1 })
    })

    it('should return undefined when the reader fails', async () => {
      expect(
        await readJsonBody(async () => {
          throw new SyntaxError('Unexpected end of JSON input')
        }),
      ).toBeUndefined()
    })
  })
})
