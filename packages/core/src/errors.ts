// @tollgate/core — Typed error taxonomy

/** Machine-readable error category */
export type TollgateErrorCode =
  | 'invalid_parameter'
  | 'encryption_failed'
  | 'decryption_failed'
  | 'issuance_failed'

/**
 * Base class for every error raised by Tollgate.
 *
 * Callers branch on `instanceof` or on `code`; `message` is for humans and logs.
 */
export class TollgateError extends Error {
  readonly code: TollgateErrorCode

  constructor(message: string, code: TollgateErrorCode, options?: ErrorOptions) {
    super(message, options)
    this.name = 'TollgateError'
    this.code = code
  }
}

/** Malformed input: non-positive random length, empty token id, bad TTL or config */
export class InvalidParameterError extends TollgateError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'invalid_parameter', options)
    this.name = 'InvalidParameterError'
  }
}

/** Invalid key material at construction, or an encryption fault */
export class EncryptionError extends TollgateError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'encryption_failed', options)
    this.name = 'EncryptionError'
  }
}

/**
 * Any decryption failure.
 *
 * Wrong key, tampered bytes, malformed input and an exceeded age bound all
 * surface as this one type with one message.
 */
export class DecryptionError extends TollgateError {
  constructor(options?: ErrorOptions) {
    super('Invalid or expired token', 'decryption_failed', options)
    this.name = 'DecryptionError'
  }
}

/** Issuance failed; wraps the underlying `InvalidParameterError` as `cause` */
export class IssuanceError extends TollgateError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'issuance_failed', options)
    this.name = 'IssuanceError'
  }
}
