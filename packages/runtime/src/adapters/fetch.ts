// @tollgate/runtime — Native Fetch adapter (Node 20 fetch servers, edge runtimes)

import { createConsoleLogger } from '@tollgate/core'
import type { Logger } from '@tollgate/core'
import type { TokenEndpointOptions, TokenEndpointResult, TokenService } from '../types.js'
import { DEFAULT_BASE_PATH } from '../types.js'
import { readJsonBody } from '../request-body.js'
import { handleTokenRoute, matchTokenRoute, routeReadsBody } from '../token-endpoint.js'

// ============================================================
// Types
// ============================================================

/** A handler that processes a Request and returns a Response */
export type FetchHandler = (request: Request) => Promise<Response> | Response

/**
 * Extracts the pathname from a Request URL.
 */
function extractPathname(request: Request): string {
  try {
    return new URL(request.url).pathname
  } catch {
    // Fallback for relative URLs
    const qIndex = request.url.indexOf('?')
    return qIndex >= 0 ? request.url.slice(0, qIndex) : request.url
  }
}

function toResponse(result: TokenEndpointResult): Response {
  if (result.body === null) {
    return new Response(null, { status: result.status })
  }
  return new Response(JSON.stringify(result.body), {
    status: result.status,
    headers: { 'content-type': 'application/json' },
  })
}

async function dispatch(
  service: TokenService,
  request: Request,
  basePath: string,
  logger: Logger,
): Promise<TokenEndpointResult | null> {
  const route = matchTokenRoute(request.method, extractPathname(request), basePath)
  if (route === null) return null

  const body = routeReadsBody(route) ? await readJsonBody(() => request.json()) : undefined
  return handleTokenRoute(service, route, body, logger)
}

// ============================================================
// Fetch Factories
// ============================================================

/**
 * Creates a standalone token route handler using the Fetch API.
 *
 * It only serves the token routes and returns 404 for everything else.
 *
 * @param service - Initialized TokenService
 * @param options - Base path and logger
 * @returns FetchHandler for the token routes only
 *
 * @example
 * ```typescript
 * import { createTokenService } from '@tollgate/runtime'
 * import { createFetchTokenHandler } from '@tollgate/runtime/fetch'
 *
 * const service = await createTokenService()
 * const handler = createFetchTokenHandler(service)
 * const response = await handler(new Request('http://localhost/tokens/stats'))
 * ```
 */
export function createFetchTokenHandler(
  service: TokenService,
  options?: TokenEndpointOptions,
): FetchHandler {
  const basePath = options?.basePath ?? DEFAULT_BASE_PATH
  const logger = options?.logger ?? createConsoleLogger({ level: 'warn' })

  return async (request: Request): Promise<Response> => {
    const result = await dispatch(service, request, basePath, logger)
    if (result !== null) return toResponse(result)

    return new Response(JSON.stringify({ error: 'Not found' }), {
      status: 404,
      headers: { 'content-type': 'application/json' },
    })
  }
}

/**
 * Wraps a request handler: token routes are served here, every other
 * request goes to `handler` untouched, its body unread.
 *
 * @param service - Initialized TokenService
 * @param handler - The application handler for all other requests
 * @param options - Base path and logger
 */
export function createFetchMiddleware(
  service: TokenService,
  handler: FetchHandler,
  options?: TokenEndpointOptions,
): FetchHandler {
  const basePath = options?.basePath ?? DEFAULT_BASE_PATH
  const logger = options?.logger ?? createConsoleLogger({ level: 'warn' })

  return async (request: Request): Promise<Response> => {
    const result = await dispatch(service, request, basePath, logger)
    if (result !== null) return toResponse(result)
    return handler(request)
  }
}
