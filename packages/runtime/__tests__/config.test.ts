import { describe, it, expect } from 'vitest'
import { InvalidParameterError } from '@tollgate/core'
import { loadConfigFromEnv, resolveConfig } from '../src/config.js'

describe('config', () => {
  describe('resolveConfig', () => {
    it('should apply defaults', () => {
      expect(resolveConfig({})).toEqual({
        sweepIntervalMs: 60_000,
        defaultTTLSeconds: 300,
        minTTLSeconds: 1,
        maxTTLSeconds: 3600,
        tokenBytes: 32,
      })
    })

    it('should keep explicit values', () => {
      expect(
        resolveConfig({
          sweepIntervalMs: 5_000,
          defaultTTLSeconds: 60,
          minTTLSeconds: 10,
          maxTTLSeconds: 120,
          tokenBytes: 48,
        }),
      ).toEqual({
        sweepIntervalMs: 5_000,
        defaultTTLSeconds: 60,
        minTTLSeconds: 10,
        maxTTLSeconds: 120,
        tokenBytes: 48,
      })
    })

    it('should reject non-positive and fractional values', () => {
      expect(() => resolveConfig({ sweepIntervalMs: 0 })).toThrow(
        'sweepIntervalMs must be a positive integer, got 0',
      )
      expect(() => resolveConfig({ minTTLSeconds: 0.5 })).toThrow(InvalidParameterError)
      expect(() => resolveConfig({ tokenBytes: -32 })).toThrow(InvalidParameterError)
    })

    it('should reject a max TTL below the min TTL', () => {
      expect(() => resolveConfig({ minTTLSeconds: 100, maxTTLSeconds: 50, defaultTTLSeconds: 60 })).toThrow(
        'maxTTLSeconds (50) must not be below minTTLSeconds (100)',
      )
    })

    it('should reject a default TTL outside the range', () => {
      expect(() => resolveConfig({ maxTTLSeconds: 120 })).toThrow(
        'defaultTTLSeconds must be between 1 and 120, got 300',
      )
    })
  })

  describe('loadConfigFromEnv', () => {
    it('should leave unset variables undefined', () => {
      const config = loadConfigFromEnv({})
      expect(config.masterKey).toBeUndefined()
      expect(config.sweepIntervalMs).toBeUndefined()
      expect(config.defaultTTLSeconds).toBeUndefined()
      expect(config.maxTTLSeconds).toBeUndefined()
      expect(config.tokenBytes).toBeUndefined()
      expect(config.logger).toBeDefined()
    })

    it('should read every variable', () => {
      const config = loadConfigFromEnv({
        TOLLGATE_MASTER_KEY: 'test-master-key',
        TOLLGATE_SWEEP_INTERVAL_MS: '1000',
        TOLLGATE_DEFAULT_TTL_SECONDS: '60',
        TOLLGATE_MAX_TTL_SECONDS: '600',
        TOLLGATE_TOKEN_BYTES: '48',
        TOLLGATE_LOG_LEVEL: 'DEBUG',
        TOLLGATE_LOG_JSON: 'true',
      })
      expect(config).toMatchObject({
        masterKey: 'test-master-key',
        sweepIntervalMs: 1000,
        defaultTTLSeconds: 60,
        maxTTLSeconds: 600,
        tokenBytes: 48,
      })
    })

    it('should treat empty variables as unset', () => {
      const config = loadConfigFromEnv({ TOLLGATE_MASTER_KEY: '', TOLLGATE_TOKEN_BYTES: '' })
      expect(config.masterKey).toBeUndefined()
      expect(config.tokenBytes).toBeUndefined()
    })

    it('should name the variable that is not an integer', () => {
      expect(() => loadConfigFromEnv({ TOLLGATE_MAX_TTL_SECONDS: '1h' })).toThrow(
        'TOLLGATE_MAX_TTL_SECONDS must be a positive integer, got "1h"',
      )
      expect(() => loadConfigFromEnv({ TOLLGATE_SWEEP_INTERVAL_MS: '-1' })).toThrow(
        InvalidParameterError,
      )
    })

    it('should reject an unknown log level', () => {
      expect(() => loadConfigFromEnv({ TOLLGATE_LOG_LEVEL: 'verbose' })).toThrow(
        'TOLLGATE_LOG_LEVEL must be one of debug, info, warn, error, silent, got "verbose"',
      )
    })

    it('should reject a log format flag that is not boolean', () => {
      expect(() => loadConfigFromEnv({ TOLLGATE_LOG_JSON: 'yes' })).toThrow(
        'TOLLGATE_LOG_JSON must be true or false, got "yes"',
      )
    })
  })
})
