// @tollgate/runtime — Request path and body parsing for the token routes

import type { Metadata } from '@tollgate/core'
import type { ScopeInput } from './types.js'

// ============================================================
// Path Normalization
// ============================================================

/**
 * Normalizes a request path for consistent matching.
 *
 * - Strips trailing slashes: `/tokens/` → `/tokens`
 * - Preserves root path: `/` → `/`
 * - Does NOT lowercase (paths are case-sensitive per RFC 3986)
 */
export function normalizePath(path: string): string {
  if (path.length === 0 || path === '/') return '/'

  let end = path.length
  while (end > 0 && path.charCodeAt(end - 1) === 47) end--

  if (end === path.length) return path
  if (end === 0) return '/'
  return path.slice(0, end)
}

// ============================================================
// Body Parsing
// ============================================================

/** Outcome of parsing a request body */
export type ParseResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: string }

/** Parsed body of `POST {base}/issue` */
export interface IssueRequest {
  readonly scope: ScopeInput
  readonly ttlSeconds: number | undefined
  readonly metadata: Metadata
}

/** Plain JSON object (not an array, not null) */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

function fail<T>(error: string): ParseResult<T> {
  return { ok: false, error }
}

/**
 * Parses the issue request body.
 *
 * ```json
 * { "scope": { "resource": "reports", "actions": ["read"], "metadata": {} },
 *   "ttlSeconds": 300, "metadata": {} }
 * ```
 *
 * `actions` and both `metadata` objects default to empty; a missing
 * `ttlSeconds` is left to the service default.
 */
export function parseIssueRequest(body: unknown): ParseResult<IssueRequest> {
  if (!isPlainObject(body)) return fail('Request body must be a JSON object')

  const scope = body['scope']
  if (!isPlainObject(scope)) return fail('scope must be an object')

  const resource = scope['resource']
  if (typeof resource !== 'string') return fail('scope.resource must be a string')

  const actions = scope['actions'] ?? []
  if (!isStringArray(actions)) return fail('scope.actions must be an array of strings')

  const scopeMetadata = scope['metadata'] ?? {}
  if (!isPlainObject(scopeMetadata)) return fail('scope.metadata must be an object')

  const ttlSeconds = body['ttlSeconds']
  if (ttlSeconds !== undefined && !Number.isInteger(ttlSeconds)) {
    return fail('ttlSeconds must be an integer')
  }

  const metadata = body['metadata'] ?? {}
  if (!isPlainObject(metadata)) return fail('metadata must be an object')

  return {
    ok: true,
    value: {
      scope: { resource, actions, metadata: scopeMetadata },
      ttlSeconds: typeof ttlSeconds === 'number' ? ttlSeconds : undefined,
      metadata,
    },
  }
}

/**
 * Parses the validate request body: `{ "tokenId": "..." }`.
 */
export function parseValidateRequest(body: unknown): ParseResult<string> {
  if (!isPlainObject(body)) return fail('Request body must be a JSON object')
  const tokenId = body['tokenId']
  if (typeof tokenId !== 'string' || tokenId === '') return fail('tokenId is required')
  return { ok: true, value: tokenId }
}

/**
 * Reads a JSON body through a framework's reader.
 * A body that is absent or not JSON yields undefined, which the parsers
 * above report as a 400.
 */
export async function readJsonBody(read: () => Promise<unknown>): Promise<unknown> {
  try {
    return await read()
  } catch {
    return undefined
  }
}
