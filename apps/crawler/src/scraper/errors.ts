/**
 * Crawler Error Taxonomy
 *
 * Per-item errors (fetch, structure) are recovered where they happen: the item
 * is skipped and counted. Only FatalConfigError ends a run, before any record
 * is written.
 */

import { ZodError } from 'zod'
import type { FetchResult } from './types.js'

export type CrawlerErrorCode =
  | 'TRANSIENT_FETCH'
  | 'PERMANENT_FETCH'
  | 'STRUCTURAL_PARSE'
  | 'FATAL_CONFIG'

export class CrawlerError extends Error {
  public readonly code: CrawlerErrorCode
  public readonly retryable: boolean

  constructor(message: string, options: { code: CrawlerErrorCode; retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options.cause })
    this.name = new.target.name
    this.code = options.code
    this.retryable = options.retryable ?? false
  }
}

/**
 * Timeout, connection failure or retryable HTTP status.
 */
export class TransientFetchError extends CrawlerError {
  public readonly url: string
  public readonly attempts: number

  constructor(message: string, url: string, attempts = 1, cause?: unknown) {
    super(message, { code: 'TRANSIENT_FETCH', retryable: true, cause })
    this.url = url
    this.attempts = attempts
  }
}

/**
 * Not found, blocked, oversized: retrying cannot help.
 */
export class PermanentFetchError extends CrawlerError {
  public readonly url: string
  public readonly statusCode?: number

  constructor(message: string, url: string, statusCode?: number) {
    super(message, { code: 'PERMANENT_FETCH' })
    this.url = url
    this.statusCode = statusCode
  }
}

/**
 * The document is not the expected page type.
 */
export class StructuralParseError extends CrawlerError {
  public readonly url: string

  constructor(message: string, url: string) {
    super(message, { code: 'STRUCTURAL_PARSE' })
    this.url = url
  }
}

/**
 * Unusable configuration detected at startup. Exit code 2.
 */
export class FatalConfigError extends CrawlerError {
  public readonly exitCode = 2

  constructor(message: string, cause?: unknown) {
    super(message, { code: 'FATAL_CONFIG', cause })
  }
}

export type FetchError = TransientFetchError | PermanentFetchError

/**
 * Map a non-ok fetch result to the error it represents.
 */
export function fetchResultError(url: string, result: FetchResult): FetchError {
  const attempts = result.attempts ?? 1
  const detail = result.error ?? result.status

  switch (result.status) {
    case 'timeout':
    case 'network':
    case 'aborted':
      return new TransientFetchError(detail, url, attempts)
    case 'error':
      if (result.statusCode !== undefined && isRetryableStatus(result.statusCode)) {
        return new TransientFetchError(detail, url, attempts)
      }
      return new PermanentFetchError(detail, url, result.statusCode)
    default:
      return new PermanentFetchError(detail, url, result.statusCode)
  }
}

/**
 * Whether a failed result is worth another attempt under the given policy codes.
 */
export function isTransientResult(result: FetchResult, retryableStatusCodes: readonly number[]): boolean {
  switch (result.status) {
    case 'timeout':
    case 'network':
      return true
    case 'error':
      return result.statusCode !== undefined && retryableStatusCodes.includes(result.statusCode)
    default:
      return false
  }
}

function isRetryableStatus(statusCode: number): boolean {
  return statusCode === 408 || statusCode === 425 || statusCode === 429 || statusCode >= 500
}

/**
 * Convert option validation failures into a FatalConfigError with one line per issue.
 */
export function toFatalConfigError(error: unknown): FatalConfigError {
  if (error instanceof FatalConfigError) {
    return error
  }
  if (error instanceof ZodError) {
    const issues = error.issues.map(issue => {
      const path = issue.path.join('.')
      return path ? `--${path}: ${issue.message}` : issue.message
    })
    return new FatalConfigError(`Invalid options: ${issues.join('; ')}`, error)
  }
  if (error instanceof Error) {
    return new FatalConfigError(error.message, error)
  }
  return new FatalConfigError(String(error))
}

/**
 * Structured log fields for an error.
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof CrawlerError) {
    return {
      error_code: error.code,
      error_message: error.message,
      error_is_retryable: error.retryable,
      ...(error instanceof PermanentFetchError && error.statusCode !== undefined
        ? { error_status_code: error.statusCode }
        : {}),
      ...(error instanceof TransientFetchError ? { attempts: error.attempts } : {}),
    }
  }
  if (error instanceof Error) {
    return {
      error_code: 'UNEXPECTED_ERROR',
      error_message: error.message,
      error_name: error.name,
    }
  }
  return { error_code: 'UNEXPECTED_ERROR', error_message: String(error) }
}
