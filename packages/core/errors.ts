/**
 * Error taxonomy
 *
 * Everything here extends the retry categories so `retry()` can tell a
 * rate limit (transient) from a rejected credential (permanent).
 */

import { PermanentError, TransientError } from './retry.js'

export { PermanentError, TransientError, RetryExhaustedError } from './retry.js'

/** Required configuration is missing or invalid */
export class ConfigError extends PermanentError {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/** Caller supplied invalid arguments */
export class ValidationError extends PermanentError {
  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/** The API rejected the credential (401/403) */
export class AuthenticationError extends PermanentError {
  readonly status: number

  constructor(status: number, detail = '') {
    super(`Authentication failed (HTTP ${status})${detail ? `: ${detail}` : ''}`)
    this.name = 'AuthenticationError'
    this.status = status
  }
}

/** The API answered 429 */
export class RateLimitError extends TransientError {
  readonly status = 429

  constructor(detail = '') {
    super(`Rate limited (HTTP 429)${detail ? `: ${detail}` : ''}`)
    this.name = 'RateLimitError'
  }
}

/** Any other non-2xx answer */
export class ApiError extends PermanentError {
  readonly status: number

  constructor(status: number, detail = '') {
    super(`API request failed (HTTP ${status})${detail ? `: ${detail}` : ''}`)
    this.name = 'ApiError'
    this.status = status
  }
}

/** Response body is not JSON or does not match the expected shape */
export class ResponseParseError extends PermanentError {
  constructor(message: string, cause?: Error) {
    super(message, cause)
    this.name = 'ResponseParseError'
  }
}

/** Writing an output file failed */
export class ExportError extends PermanentError {
  readonly path: string

  constructor(path: string, cause?: Error) {
    super(`Could not write ${path}${cause ? `: ${cause.message}` : ''}`, cause)
    this.name = 'ExportError'
    this.path = path
  }
}

/** Newsletter rendering failed (e.g. unknown template) */
export class RenderError extends PermanentError {
  constructor(message: string) {
    super(message)
    this.name = 'RenderError'
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
