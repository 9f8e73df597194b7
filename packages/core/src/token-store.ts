// @tollgate/core — In-memory token store (lazy expiry on read, periodic sweep)

import { clearInterval, setInterval } from 'node:timers'
import type { Token } from './types.js'
import { DEFAULT_SWEEP_INTERVAL_MS } from './types.js'
import type { Logger } from './logger.js'
import { createConsoleLogger, redactTokenId } from './logger.js'
import { InvalidParameterError } from './errors.js'

/**
 * TokenStore holds active tokens and never hands out an expired one.
 *
 * - In-memory Map keyed by token id (no persistence, no replication)
 * - Every read is also a potential write: `get` evicts an expired entry
 * - A background sweep removes expired entries nobody reads
 * - Every method is synchronous, so each one runs to completion before any
 *   other caller or the sweep callback gets the event loop, so no lock is needed
 */
export interface TokenStore {
  /** Inserts or replaces the token under its `tokenId`. */
  put(token: Token): void

  /**
   * Returns the token, or undefined if absent.
   * An entry with `expiresAt <= now` is deleted and reported absent.
   */
  get(tokenId: string): Token | undefined

  /** Deletes an entry. Returns true if something was removed. */
  remove(tokenId: string): boolean

  /** Full scan: deletes every entry with `expiresAt <= now`, returns the count. */
  sweep(): number

  /** Active entries; sweeps first so the count never includes stale ones. */
  count(): number

  /** Removes everything (test isolation, not a production operation). */
  clear(): void

  /**
   * Stops the background sweep. Idempotent.
   * No sweep runs after this returns; stored tokens are kept.
   */
  shutdown(): void

  /** Whether the background sweep is still scheduled */
  readonly sweeping: boolean
}

/**
 * Configuration for the token store.
 */
export interface TokenStoreConfig {
  /** Background sweep interval in milliseconds (default: 60 seconds) */
  readonly sweepIntervalMs?: number | undefined
  /** Clock in epoch milliseconds (default: Date.now) */
  readonly now?: (() => number) | undefined
  /** Logger for sweep results and failures (default: console at 'warn') */
  readonly logger?: Logger | undefined
}

/**
 * Creates an in-memory token store and starts its background sweep.
 *
 * Design constraints:
 * - One Map is the only mutable state; entries are frozen Token records
 * - Expiry is `expiresAt <= now` everywhere (get, sweep, count)
 * - The sweep timer is unref'd and never keeps the process alive
 * - A failing scheduled sweep is logged and the schedule continues
 *
 * @param config - Optional store configuration
 * @returns TokenStore instance
 * @throws {InvalidParameterError} If `sweepIntervalMs` is not a positive integer
 */
export function createTokenStore(config?: TokenStoreConfig): TokenStore {
  const sweepIntervalMs = config?.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS
  const now = config?.now ?? Date.now
  const logger = config?.logger ?? createConsoleLogger({ level: 'warn' })

  if (!Number.isInteger(sweepIntervalMs) || sweepIntervalMs <= 0) {
    throw new InvalidParameterError(
      `Sweep interval must be a positive integer, got ${String(sweepIntervalMs)}`,
    )
  }

  const tokens = new Map<string, Token>()
  let stopped = false

  function sweep(): number {
    const current = now()
    let removed = 0
    for (const [tokenId, token] of tokens) {
      if (token.expiresAt <= current) {
        tokens.delete(tokenId)
        removed++
      }
    }
    if (removed > 0) {
      logger.info('swept expired tokens', { removed })
    }
    return removed
  }

  function runScheduledSweep(): void {
    if (stopped) return
    try {
      sweep()
    } catch (err) {
      logger.error('token sweep failed', { error: err })
    }
  }

  const timer = setInterval(runScheduledSweep, sweepIntervalMs)
  timer.unref()

  return {
    put(token: Token): void {
      tokens.set(token.tokenId, token)
      logger.debug('stored token', {
        tokenId: redactTokenId(token.tokenId),
        expiresAt: token.expiresAt,
      })
    },

    get(tokenId: string): Token | undefined {
      const token = tokens.get(tokenId)
      if (token === undefined) return undefined

      if (token.expiresAt <= now()) {
        tokens.delete(tokenId)
        return undefined
      }

      return token
    },

    remove(tokenId: string): boolean {
      return tokens.delete(tokenId)
    },

    sweep,

    count(): number {
      sweep()
      return tokens.size
    },

    clear(): void {
      tokens.clear()
    },

    shutdown(): void {
      if (stopped) return
      stopped = true
      clearInterval(timer)
    },

    get sweeping(): boolean {
      return !stopped
    },
  }
}
