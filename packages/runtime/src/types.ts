// @tollgate/runtime — Types and configuration interfaces

import type {
  CryptoPrimitives,
  CryptoProvider,
  Logger,
  MasterKeyInput,
  Metadata,
  Scope,
  Token,
  TokenStore,
} from '@tollgate/core'

// ============================================================
// Token Service Configuration
// ============================================================

/**
 * Configuration for `createTokenService`. Every field is optional.
 *
 * @example
 * ```typescript
 * const service = await createTokenService({
 *   masterKey: process.env.TOLLGATE_MASTER_KEY,
 *   maxTTLSeconds: 900,
 * })
 * ```
 */
export interface TokenServiceConfig {
  // ---- Crypto ----

  /** 32-byte master key, raw or base64url (default: freshly generated) */
  readonly masterKey?: MasterKeyInput | undefined

  /** Prebuilt primitives instance; mutually exclusive with `masterKey` */
  readonly crypto?: CryptoPrimitives | undefined

  /** Custom CryptoProvider implementation (default: WebCryptoCryptoProvider) */
  readonly cryptoProvider?: CryptoProvider | undefined

  // ---- Store ----

  /** Prebuilt token store (default: in-memory store owned by the service) */
  readonly store?: TokenStore | undefined

  /** Background sweep interval in milliseconds (default: 60_000) */
  readonly sweepIntervalMs?: number | undefined

  // ---- Issuance ----

  /** TTL used when `issue` gets none (default: 300 s) */
  readonly defaultTTLSeconds?: number | undefined

  /** Smallest accepted TTL (default: 1 s) */
  readonly minTTLSeconds?: number | undefined

  /** Largest accepted TTL (default: 3600 s) */
  readonly maxTTLSeconds?: number | undefined

  /** Random bytes per token id, at least 32 (default: 32) */
  readonly tokenBytes?: number | undefined

  // ---- Ambient ----

  /** Logger (default: console at 'warn') */
  readonly logger?: Logger | undefined

  /** Clock in epoch milliseconds (default: Date.now) */
  readonly now?: (() => number) | undefined
}

/**
 * Numeric settings with defaults applied.
 * Exposed as `service.config`.
 */
export interface ResolvedTokenServiceConfig {
  readonly sweepIntervalMs: number
  readonly defaultTTLSeconds: number
  readonly minTTLSeconds: number
  readonly maxTTLSeconds: number
  readonly tokenBytes: number
}

// ============================================================
// Token Service
// ============================================================

/** Scope as supplied by a caller; `actions` and `metadata` default to empty */
export interface ScopeInput {
  readonly resource: string
  readonly actions?: readonly string[] | undefined
  readonly metadata?: Metadata | undefined
}

/** Result of a successful `issue` */
export interface IssuedToken {
  readonly tokenId: string
  readonly scope: Scope
  /** Epoch milliseconds */
  readonly expiresAt: number
  readonly ttlSeconds: number
}

/**
 * Result of `validate`.
 *
 * A missing, revoked or expired token is a normal `{ valid: false }` outcome;
 * the three causes are not told apart.
 */
export type ValidationResult =
  | {
      readonly valid: true
      readonly tokenId: string
      readonly scope: Scope
      readonly expiresAt: number
      /** Seconds until expiry, fractional, never negative */
      readonly ttlRemaining: number
    }
  | { readonly valid: false; readonly reason: string }

/**
 * The token service instance.
 *
 * Created by `createTokenService(config)`. Holds the crypto primitives and
 * the token store; every operation on the store completes synchronously.
 */
export interface TokenService {
  /**
   * Issues a token for `scope`.
   *
   * @throws {IssuanceError} If the TTL or scope is invalid, or no unique id could be drawn
   */
  issue(scope: ScopeInput, ttlSeconds?: number, metadata?: Metadata): IssuedToken

  /**
   * Looks up a token.
   *
   * @throws {InvalidParameterError} If `tokenId` is empty
   */
  validate(tokenId: string): ValidationResult

  /**
   * Removes a token. Returns false if it was not active.
   *
   * @throws {InvalidParameterError} If `tokenId` is empty
   */
  revoke(tokenId: string): boolean

  /** Full record of an active token, or undefined */
  getToken(tokenId: string): Token | undefined

  /** Sweeps expired tokens now; returns how many were removed */
  cleanup(): number

  /** Number of active tokens */
  activeCount(): number

  /** Drops every token */
  clear(): void

  /** Stops the background sweep. Idempotent; stored tokens are kept. */
  shutdown(): void

  /** Primitives bound to the service's master key */
  readonly crypto: CryptoPrimitives

  /** Resolved configuration (readonly) */
  readonly config: ResolvedTokenServiceConfig
}

// ============================================================
// Token Endpoint Types
// ============================================================

/** Token endpoint response (returned by `handleTokenEndpoint`) */
export interface TokenEndpointResult {
  readonly status: number
  /** JSON body, or null for an empty response */
  readonly body: Readonly<Record<string, unknown>> | null
}

/** Error response body */
export interface ErrorResponseBody {
  readonly error: string
}

/**
 * Options for framework adapters.
 */
export interface TokenEndpointOptions {
  /** Path prefix of the token routes (default: '/tokens') */
  readonly basePath?: string | undefined

  /** Logger for unexpected failures (default: console at 'warn') */
  readonly logger?: Logger | undefined
}

// ============================================================
// Default Constants
// ============================================================

/** Default token routes prefix */
export const DEFAULT_BASE_PATH = '/tokens'

/** Default TTL for `issue` in seconds */
export const DEFAULT_TTL_SECONDS = 300

/** Default lower TTL bound in seconds */
export const DEFAULT_MIN_TTL_SECONDS = 1

/** Default upper TTL bound in seconds */
export const DEFAULT_MAX_TTL_SECONDS = 3600

/** Random bytes per token id (256 bits) */
export const DEFAULT_TOKEN_BYTES = 32

/** Attempts to draw an unused token id before giving up */
export const MAX_ID_ATTEMPTS = 3

/** Reason reported by `validate` for any unknown token */
export const NOT_FOUND_REASON = 'not found or expired'
