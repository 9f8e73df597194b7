// @tollgate/runtime — Token service (issue, validate, revoke over the token store)

import {
  IssuanceError,
  InvalidParameterError,
  createConsoleLogger,
  createCryptoPrimitives,
  createTokenStore,
  redactTokenId,
} from '@tollgate/core'
import type { CryptoPrimitives, Metadata, Scope, Token, TokenStore } from '@tollgate/core'
import type {
  IssuedToken,
  ScopeInput,
  TokenService,
  TokenServiceConfig,
  ValidationResult,
} from './types.js'
import { MAX_ID_ATTEMPTS, NOT_FOUND_REASON } from './types.js'
import { resolveConfig } from './config.js'

// ============================================================
// Freezing
// ============================================================

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }
  return value
}

/**
 * Detached, deep-frozen copy of caller metadata.
 * Later writes to the caller's object cannot reach a stored token.
 */
function freezeMetadata(metadata: Metadata | undefined): Metadata {
  if (metadata === undefined) return Object.freeze({})
  try {
    return deepFreeze(structuredClone(metadata))
  } catch (err) {
    throw new InvalidParameterError('Metadata must be structured-cloneable data', { cause: err })
  }
}

function buildScope(input: ScopeInput): Scope {
  if (typeof input.resource !== 'string') {
    throw new InvalidParameterError('scope.resource must be a string')
  }
  const actions = input.actions ?? []
  if (!actions.every((action) => typeof action === 'string')) {
    throw new InvalidParameterError('scope.actions must be an array of strings')
  }
  return Object.freeze({
    resource: input.resource,
    actions: Object.freeze([...actions]),
    metadata: freezeMetadata(input.metadata),
  })
}

function requireTokenId(tokenId: string): void {
  if (typeof tokenId !== 'string' || tokenId === '') {
    throw new InvalidParameterError('Token id must be a non-empty string')
  }
}

// ============================================================
// Token Service Factory
// ============================================================

/**
 * Creates a token service.
 *
 * Builds (or takes) the crypto primitives and the token store, and starts the
 * store's background sweep. Call `shutdown()` to stop it.
 *
 * @param config - Optional configuration (defaults described on `TokenServiceConfig`)
 * @throws {InvalidParameterError} If the configuration is inconsistent
 * @throws {EncryptionError} If `masterKey` is not a valid 32-byte key
 *
 * @example
 * ```typescript
 * const service = await createTokenService({ masterKey: process.env.TOLLGATE_MASTER_KEY })
 * const { tokenId } = service.issue({ resource: 'reports', actions: ['read'] }, 600)
 * service.validate(tokenId) // { valid: true, ... }
 * ```
 */
export async function createTokenService(config: TokenServiceConfig = {}): Promise<TokenService> {
  const resolved = resolveConfig(config)
  const now = config.now ?? Date.now
  const logger = config.logger ?? createConsoleLogger({ level: 'warn' })

  const crypto: CryptoPrimitives =
    config.crypto ??
    (await createCryptoPrimitives({
      masterKey: config.masterKey,
      cryptoProvider: config.cryptoProvider,
      now,
    }))

  const store: TokenStore =
    config.store ??
    createTokenStore({ sweepIntervalMs: resolved.sweepIntervalMs, now, logger })

  function drawTokenId(): string {
    for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt++) {
      const tokenId = crypto.randomUrlSafe(resolved.tokenBytes)
      if (store.get(tokenId) === undefined) return tokenId
      logger.warn('token id collision', { tokenId: redactTokenId(tokenId), attempt })
    }
    throw new IssuanceError(
      `Token issuance failed: no unused id after ${String(MAX_ID_ATTEMPTS)} attempts`,
    )
  }

  function issue(
    scopeInput: ScopeInput,
    ttlSeconds: number = resolved.defaultTTLSeconds,
    metadata?: Metadata,
  ): IssuedToken {
    let scope: Scope
    let frozenMetadata: Metadata
    try {
      if (
        !Number.isInteger(ttlSeconds) ||
        ttlSeconds < resolved.minTTLSeconds ||
        ttlSeconds > resolved.maxTTLSeconds
      ) {
        throw new InvalidParameterError(
          `ttlSeconds must be an integer between ${String(resolved.minTTLSeconds)} and ` +
            `${String(resolved.maxTTLSeconds)}, got ${String(ttlSeconds)}`,
        )
      }
      scope = buildScope(scopeInput)
      frozenMetadata = freezeMetadata(metadata)
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new IssuanceError(`Token issuance failed: ${reason}`, { cause: err })
    }

    const tokenId = drawTokenId()
    const createdAt = now()
    const token: Token = Object.freeze({
      tokenId,
      scope,
      createdAt,
      expiresAt: createdAt + ttlSeconds * 1000,
      metadata: frozenMetadata,
    })
    store.put(token)

    logger.info('token issued', {
      tokenId: redactTokenId(tokenId),
      resource: scope.resource,
      ttlSeconds,
    })

    return { tokenId, scope, expiresAt: token.expiresAt, ttlSeconds }
  }

  function validate(tokenId: string): ValidationResult {
    requireTokenId(tokenId)

    const token = store.get(tokenId)
    if (token === undefined) {
      logger.debug('token validation failed', { tokenId: redactTokenId(tokenId) })
      return { valid: false, reason: NOT_FOUND_REASON }
    }

    return {
      valid: true,
      tokenId: token.tokenId,
      scope: token.scope,
      expiresAt: token.expiresAt,
      ttlRemaining: Math.max(0, token.expiresAt - now()) / 1000,
    }
  }

  function revoke(tokenId: string): boolean {
    requireTokenId(tokenId)

    const removed = store.remove(tokenId)
    if (removed) {
      logger.info('token revoked', { tokenId: redactTokenId(tokenId) })
    } else {
      logger.debug('revoke of unknown token', { tokenId: redactTokenId(tokenId) })
    }
    return removed
  }

  return {
    issue,
    validate,
    revoke,

    getToken(tokenId: string): Token | undefined {
      requireTokenId(tokenId)
      return store.get(tokenId)
    },

    cleanup(): number {
      const removed = store.sweep()
      logger.info('manual cleanup', { removed })
      return removed
    },

    activeCount(): number {
      return store.count()
    },

    clear(): void {
      store.clear()
      logger.warn('all tokens cleared')
    },

    shutdown(): void {
      store.shutdown()
    },

    crypto,
    config: resolved,
  }
}
