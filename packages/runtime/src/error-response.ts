// @tollgate/runtime — Error and success responses for the token routes

import { InvalidParameterError, IssuanceError } from '@tollgate/core'
import type { Logger } from '@tollgate/core'
import type { TokenEndpointResult } from './types.js'

/**
 * Message for any failure the caller did not cause.
 * Details go to the logger only, never to the response body.
 */
const INTERNAL_ERROR_MESSAGE = 'Internal server error'

/** Message for a revoke of an unknown token */
export const TOKEN_NOT_FOUND_MESSAGE = 'Token not found'

/**
 * Creates a JSON error response: `{ error: message }`.
 */
export function createErrorResponse(status: number, message: string): TokenEndpointResult {
  return { status, body: { error: message } }
}

/**
 * Creates a JSON success response.
 */
export function createJsonResponse(
  status: number,
  body: Readonly<Record<string, unknown>>,
): TokenEndpointResult {
  return { status, body }
}

/** 204 with no body */
export function createEmptyResponse(): TokenEndpointResult {
  return { status: 204, body: null }
}

/**
 * Maps a thrown error to a response.
 *
 * - `IssuanceError` / `InvalidParameterError` → 400 with the error message
 * - anything else → 500 with a generic message, logged at `error`
 */
export function errorToResponse(err: unknown, logger: Logger): TokenEndpointResult {
  if (err instanceof IssuanceError || err instanceof InvalidParameterError) {
    return createErrorResponse(400, err.message)
  }
  logger.error('token endpoint failed', { error: err })
  return createErrorResponse(500, INTERNAL_ERROR_MESSAGE)
}
