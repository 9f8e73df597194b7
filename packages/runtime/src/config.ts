// @tollgate/runtime — Configuration resolution and environment loading

import {
  DEFAULT_SWEEP_INTERVAL_MS,
  InvalidParameterError,
  createConsoleLogger,
  isLogLevel,
} from '@tollgate/core'
import type { LogLevel } from '@tollgate/core'
import type { ResolvedTokenServiceConfig, TokenServiceConfig } from './types.js'
import {
  DEFAULT_MAX_TTL_SECONDS,
  DEFAULT_MIN_TTL_SECONDS,
  DEFAULT_TOKEN_BYTES,
  DEFAULT_TTL_SECONDS,
} from './types.js'

/** Environment as seen by `loadConfigFromEnv` */
export type Environment = Readonly<Record<string, string | undefined>>

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidParameterError(`${name} must be a positive integer, got ${String(value)}`)
  }
}

/**
 * Resolves user config with defaults applied.
 *
 * @throws {InvalidParameterError} If a value is out of range, the TTL bounds
 *   are inconsistent, or a prebuilt `crypto` or `store` comes with options it
 *   would ignore
 */
export function resolveConfig(config: TokenServiceConfig): ResolvedTokenServiceConfig {
  const resolved: ResolvedTokenServiceConfig = {
    sweepIntervalMs: config.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS,
    defaultTTLSeconds: config.defaultTTLSeconds ?? DEFAULT_TTL_SECONDS,
    minTTLSeconds: config.minTTLSeconds ?? DEFAULT_MIN_TTL_SECONDS,
    maxTTLSeconds: config.maxTTLSeconds ?? DEFAULT_MAX_TTL_SECONDS,
    tokenBytes: config.tokenBytes ?? DEFAULT_TOKEN_BYTES,
  }

  requirePositiveInteger('sweepIntervalMs', resolved.sweepIntervalMs)
  requirePositiveInteger('minTTLSeconds', resolved.minTTLSeconds)
  requirePositiveInteger('maxTTLSeconds', resolved.maxTTLSeconds)
  requirePositiveInteger('defaultTTLSeconds', resolved.defaultTTLSeconds)
  requirePositiveInteger('tokenBytes', resolved.tokenBytes)

  if (resolved.maxTTLSeconds < resolved.minTTLSeconds) {
    throw new InvalidParameterError(
      `maxTTLSeconds (${String(resolved.maxTTLSeconds)}) must not be below ` +
        `minTTLSeconds (${String(resolved.minTTLSeconds)})`,
    )
  }
  if (
    resolved.defaultTTLSeconds < resolved.minTTLSeconds ||
    resolved.defaultTTLSeconds > resolved.maxTTLSeconds
  ) {
    throw new InvalidParameterError(
      `defaultTTLSeconds must be between ${String(resolved.minTTLSeconds)} and ` +
        `${String(resolved.maxTTLSeconds)}, got ${String(resolved.defaultTTLSeconds)}`,
    )
  }
  if (resolved.tokenBytes < DEFAULT_TOKEN_BYTES) {
    throw new InvalidParameterError(
      `tokenBytes must be at least ${String(DEFAULT_TOKEN_BYTES)}, got ${String(resolved.tokenBytes)}`,
    )
  }
  if (config.crypto !== undefined && config.masterKey !== undefined) {
    throw new InvalidParameterError('Pass either masterKey or crypto, not both')
  }
  if (config.crypto !== undefined && config.cryptoProvider !== undefined) {
    throw new InvalidParameterError('Pass either cryptoProvider or crypto, not both')
  }
  if (config.store !== undefined && config.sweepIntervalMs !== undefined) {
    throw new InvalidParameterError('Pass either sweepIntervalMs or store, not both')
  }

  return resolved
}

// ============================================================
// Environment
// ============================================================

function readInteger(env: Environment, name: string): number | undefined {
  const raw = env[name]
  if (raw === undefined || raw === '') return undefined
  if (!/^\d+$/.test(raw)) {
    throw new InvalidParameterError(`${name} must be a positive integer, got "${raw}"`)
  }
  return Number(raw)
}

function readLogLevel(env: Environment, name: string): LogLevel | undefined {
  const raw = env[name]
  if (raw === undefined || raw === '') return undefined
  const level = raw.toLowerCase()
  if (!isLogLevel(level)) {
    throw new InvalidParameterError(`${name} must be one of debug, info, warn, error, silent, got "${raw}"`)
  }
  return level
}

function readBoolean(env: Environment, name: string): boolean | undefined {
  const raw = env[name]
  if (raw === undefined || raw === '') return undefined
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
      return true
    case 'false':
    case '0':
      return false
    default:
      throw new InvalidParameterError(`${name} must be true or false, got "${raw}"`)
  }
}

/**
 * Builds a `TokenServiceConfig` from environment variables.
 *
 * | Variable                        | Field               |
 * | ------------------------------- | ------------------- |
 * | `TOLLGATE_MASTER_KEY`           | `masterKey`         |
 * | `TOLLGATE_SWEEP_INTERVAL_MS`    | `sweepIntervalMs`   |
 * | `TOLLGATE_DEFAULT_TTL_SECONDS`  | `defaultTTLSeconds` |
 * | `TOLLGATE_MAX_TTL_SECONDS`      | `maxTTLSeconds`     |
 * | `TOLLGATE_TOKEN_BYTES`          | `tokenBytes`        |
 * | `TOLLGATE_LOG_LEVEL`            | logger level        |
 * | `TOLLGATE_LOG_JSON`             | logger format       |
 *
 * Unset or empty variables leave the field to its default. Range checks
 * happen later in `resolveConfig`.
 *
 * @throws {InvalidParameterError} Naming the variable that could not be parsed
 */
export function loadConfigFromEnv(env: Environment = process.env): TokenServiceConfig {
  const masterKey = env['TOLLGATE_MASTER_KEY']
  const level = readLogLevel(env, 'TOLLGATE_LOG_LEVEL')
  const json = readBoolean(env, 'TOLLGATE_LOG_JSON')

  return {
    masterKey: masterKey === '' ? undefined : masterKey,
    sweepIntervalMs: readInteger(env, 'TOLLGATE_SWEEP_INTERVAL_MS'),
    defaultTTLSeconds: readInteger(env, 'TOLLGATE_DEFAULT_TTL_SECONDS'),
    maxTTLSeconds: readInteger(env, 'TOLLGATE_MAX_TTL_SECONDS'),
    tokenBytes: readInteger(env, 'TOLLGATE_TOKEN_BYTES'),
    logger: createConsoleLogger({ level: level ?? 'warn', json: json ?? false }),
  }
}
