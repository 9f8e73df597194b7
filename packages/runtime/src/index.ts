// @tollgate/runtime — Public API surface
// Token service, configuration and the framework-agnostic token routes

// ============================================================
// Types
// ============================================================

export type {
  TokenServiceConfig,
  ResolvedTokenServiceConfig,
  TokenService,
  ScopeInput,
  IssuedToken,
  ValidationResult,
  TokenEndpointResult,
  ErrorResponseBody,
  TokenEndpointOptions,
} from './types.js'

// ============================================================
// Constants
// ============================================================

export {
  DEFAULT_BASE_PATH,
  DEFAULT_TTL_SECONDS,
  DEFAULT_MIN_TTL_SECONDS,
  DEFAULT_MAX_TTL_SECONDS,
  DEFAULT_TOKEN_BYTES,
  MAX_ID_ATTEMPTS,
  NOT_FOUND_REASON,
} from './types.js'

// ============================================================
// Token Service
// ============================================================

export { createTokenService } from './token-service.js'

// ============================================================
// Configuration
// ============================================================

export { resolveConfig, loadConfigFromEnv } from './config.js'
export type { Environment } from './config.js'

// ============================================================
// Responses
// ============================================================

export {
  createErrorResponse,
  createJsonResponse,
  createEmptyResponse,
  errorToResponse,
  TOKEN_NOT_FOUND_MESSAGE,
} from './error-response.js'

// ============================================================
// Request Parsing
// ============================================================

export {
  normalizePath,
  isPlainObject,
  parseIssueRequest,
  parseValidateRequest,
  readJsonBody,
} from './request-body.js'
export type { ParseResult, IssueRequest } from './request-body.js'

// ============================================================
// Token Endpoint Handler
// ============================================================

export { handleTokenEndpoint, handleTokenRoute, matchTokenRoute, routeReadsBody } from './token-endpoint.js'
export type { TokenRoute } from './token-endpoint.js'
