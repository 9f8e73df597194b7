// @tollgate/runtime — Hono middleware adapter

import { createConsoleLogger } from '@tollgate/core'
import type { TokenEndpointOptions, TokenService } from '../types.js'
import { DEFAULT_BASE_PATH } from '../types.js'
import { readJsonBody } from '../request-body.js'
import { handleTokenRoute, matchTokenRoute, routeReadsBody } from '../token-endpoint.js'

// ============================================================
// Minimal Hono-Compatible Types
// ============================================================

/** Minimal Hono-compatible context */
export interface HonoLikeContext {
  readonly req: {
    readonly method: string
    readonly path: string
    json(): Promise<unknown>
  }
  json(body: unknown, status?: number): Response
  body(data: null, status?: number): Response
}

/** Hono next function */
export type HonoNext = () => Promise<void>

/** Hono middleware handler */
export type HonoMiddleware = (c: HonoLikeContext, next: HonoNext) => Promise<Response | undefined>

// ============================================================
// Hono Middleware Factory
// ============================================================

/**
 * Creates Hono middleware serving the token routes.
 *
 * @param service - Initialized TokenService
 * @param options - Base path and logger
 * @returns Hono middleware handler
 *
 * @example
 * ```typescript
 * import { Hono } from 'hono'
 * import { createTokenService } from '@tollgate/runtime'
 * import { createHonoMiddleware } from '@tollgate/runtime/hono'
 *
 * const service = await createTokenService()
 * const app = new Hono()
 * app.use('*', createHonoMiddleware(service))
 * ```
 */
export function createHonoMiddleware(
  service: TokenService,
  options?: TokenEndpointOptions,
): HonoMiddleware {
  const basePath = options?.basePath ?? DEFAULT_BASE_PATH
  const logger = options?.logger ?? createConsoleLogger({ level: 'warn' })

  return async (c, next) => {
    const route = matchTokenRoute(c.req.method, c.req.path, basePath)
    if (route === null) {
      await next()
      return undefined
    }

    const body = routeReadsBody(route) ? await readJsonBody(() => c.req.json()) : undefined
    const result = handleTokenRoute(service, route, body, logger)
    if (result.body === null) {
      return c.body(null, result.status)
    }
    return c.json(result.body, result.status)
  }
}
