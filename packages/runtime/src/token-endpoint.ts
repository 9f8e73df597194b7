// @tollgate/runtime — Token endpoint handler

import { createConsoleLogger } from '@tollgate/core'
import type { Logger } from '@tollgate/core'
import type { TokenEndpointResult, TokenService } from './types.js'
import { DEFAULT_BASE_PATH } from './types.js'
import { normalizePath, parseIssueRequest, parseValidateRequest } from './request-body.js'
import {
  TOKEN_NOT_FOUND_MESSAGE,
  createEmptyResponse,
  createErrorResponse,
  createJsonResponse,
  errorToResponse,
} from './error-response.js'

/** A matched token route */
export type TokenRoute =
  | { readonly kind: 'issue' }
  | { readonly kind: 'validate' }
  | { readonly kind: 'stats' }
  | { readonly kind: 'cleanup' }
  | { readonly kind: 'revoke'; readonly tokenId: string }

/**
 * Matches a request against the token routes:
 *
 * - `POST {base}/issue` → 201 issued token
 * - `POST {base}/validate` → 200 validation result
 * - `DELETE {base}/{tokenId}` → 204, or 404 if the token is not active
 * - `GET {base}/stats` → 200 `{ activeTokens }`
 * - `POST {base}/cleanup` → 200 `{ removedTokens }`
 *
 * @returns The route, or null if the request is not a token route
 */
export function matchTokenRoute(
  method: string,
  path: string,
  basePath: string = DEFAULT_BASE_PATH,
): TokenRoute | null {
  const upperMethod = method.toUpperCase()
  const base = normalizePath(basePath)
  const reqPath = normalizePath(path)

  const prefix = base === '/' ? '/' : `${base}/`
  if (!reqPath.startsWith(prefix)) return null
  const route = reqPath.slice(prefix.length)
  if (route === '') return null

  if (upperMethod === 'POST') {
    if (route === 'issue') return { kind: 'issue' }
    if (route === 'validate') return { kind: 'validate' }
    if (route === 'cleanup') return { kind: 'cleanup' }
    return null
  }
  if (upperMethod === 'GET' && route === 'stats') return { kind: 'stats' }
  if (upperMethod === 'DELETE' && !route.includes('/')) {
    return { kind: 'revoke', tokenId: decodeRouteSegment(route) }
  }
  return null
}

/** Whether the route reads a JSON request body */
export function routeReadsBody(route: TokenRoute): boolean {
  return route.kind === 'issue' || route.kind === 'validate'
}

/**
 * Serves a matched token route.
 *
 * @param service - The token service
 * @param route - Route from `matchTokenRoute`
 * @param body - Parsed request body (issue and validate only)
 * @param logger - Logger for unexpected failures
 */
export function handleTokenRoute(
  service: TokenService,
  route: TokenRoute,
  body: unknown,
  logger: Logger = createConsoleLogger({ level: 'warn' }),
): TokenEndpointResult {
  try {
    switch (route.kind) {
      case 'issue':
        return handleIssue(service, body)
      case 'validate':
        return handleValidate(service, body)
      case 'stats':
        return createJsonResponse(200, { activeTokens: service.activeCount() })
      case 'cleanup':
        return createJsonResponse(200, { removedTokens: service.cleanup() })
      case 'revoke':
        return handleRevoke(service, route.tokenId)
    }
  } catch (err) {
    return errorToResponse(err, logger)
  }
}

/**
 * Handles token route requests.
 *
 * This is a framework-agnostic handler. Adapters that already hold a parsed
 * body call it directly; the others match first with `matchTokenRoute` and
 * read the body only when `routeReadsBody` says so.
 *
 * @param service - The token service
 * @param method - HTTP method (any case)
 * @param path - Request path
 * @param body - Parsed request body (for POST routes)
 * @param basePath - Route prefix
 * @param logger - Logger for unexpected failures
 * @returns TokenEndpointResult if the request was handled, or null if not a token route
 */
export function handleTokenEndpoint(
  service: TokenService,
  method: string,
  path: string,
  body: unknown,
  basePath: string = DEFAULT_BASE_PATH,
  logger: Logger = createConsoleLogger({ level: 'warn' }),
): TokenEndpointResult | null {
  const route = matchTokenRoute(method, path, basePath)
  if (route === null) return null
  return handleTokenRoute(service, route, body, logger)
}

function decodeRouteSegment(segment: string): string {
  try {
    return decodeURIComponent(segment)
  } catch {
    // Malformed escape: use the segment as sent, it will not match any token id
    return segment
  }
}

/**
 * Issues a token from the request body.
 */
function handleIssue(service: TokenService, body: unknown): TokenEndpointResult {
  const parsed = parseIssueRequest(body)
  if (!parsed.ok) return createErrorResponse(400, parsed.error)

  const { scope, ttlSeconds, metadata } = parsed.value
  const issued = service.issue(scope, ttlSeconds, metadata)
  return createJsonResponse(201, {
    tokenId: issued.tokenId,
    scope: issued.scope,
    expiresAt: issued.expiresAt,
    ttlSeconds: issued.ttlSeconds,
  })
}

/**
 * Validates the token named in the request body.
 */
function handleValidate(service: TokenService, body: unknown): TokenEndpointResult {
  const parsed = parseValidateRequest(body)
  if (!parsed.ok) return createErrorResponse(400, parsed.error)

  return createJsonResponse(200, service.validate(parsed.value))
}

/**
 * Revokes the token named in the path.
 */
function handleRevoke(service: TokenService, tokenId: string): TokenEndpointResult {
  if (!service.revoke(tokenId)) {
    return createErrorResponse(404, TOKEN_NOT_FOUND_MESSAGE)
  }
  return createEmptyResponse()
}
