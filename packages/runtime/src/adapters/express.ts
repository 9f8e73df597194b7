// @tollgate/runtime — Express middleware adapter

import { createConsoleLogger } from '@tollgate/core'
import type { TokenEndpointOptions, TokenService } from '../types.js'
import { DEFAULT_BASE_PATH } from '../types.js'
import { handleTokenEndpoint } from '../token-endpoint.js'

// ============================================================
// Minimal Express-Compatible Types
// ============================================================

/**
 * Minimal Express-compatible request interface.
 * Structurally compatible with `express.Request`.
 */
export interface ExpressLikeRequest {
  readonly method: string
  readonly path: string
  body?: unknown
}

/**
 * Minimal Express-compatible response interface.
 * Structurally compatible with `express.Response`.
 */
export interface ExpressLikeResponse {
  status(code: number): ExpressLikeResponse
  json(body: unknown): ExpressLikeResponse
  end(): ExpressLikeResponse
}

/** Express-compatible next function */
export type ExpressNextFunction = (err?: unknown) => void

/** Express middleware signature */
export type ExpressMiddleware = (
  req: ExpressLikeRequest,
  res: ExpressLikeResponse,
  next: ExpressNextFunction,
) => void

// ============================================================
// Express Middleware Factory
// ============================================================

/**
 * Creates Express middleware serving the token routes.
 *
 * Expects a JSON body parser (`express.json()`) to run first. Requests that
 * are not token routes go to `next()`; unexpected errors are answered with a
 * 500 by the shared handler.
 *
 * @param service - Initialized TokenService
 * @param options - Base path and logger
 * @returns Express middleware function
 *
 * @example
 * ```typescript
 * import express from 'express'
 * import { createTokenService } from '@tollgate/runtime'
 * import { createExpressMiddleware } from '@tollgate/runtime/express'
 *
 * const service = await createTokenService({ masterKey: process.env.TOLLGATE_MASTER_KEY })
 *
 * const app = express()
 * app.use(express.json())
 * app.use(createExpressMiddleware(service))
 * ```
 */
export function createExpressMiddleware(
  service: TokenService,
  options?: TokenEndpointOptions,
): ExpressMiddleware {
  const basePath = options?.basePath ?? DEFAULT_BASE_PATH
  const logger = options?.logger ?? createConsoleLogger({ level: 'warn' })

  return (req, res, next) => {
    const result = handleTokenEndpoint(service, req.method, req.path, req.body, basePath, logger)

    if (result === null) {
      next()
      return
    }

    if (result.body === null) {
      res.status(result.status).end()
      return
    }
    res.status(result.status).json(result.body)
  }
}
