/**
 * Error taxonomy for a ledger-digest run.
 *
 * ConfigError, AuthError and FetchError abort the run. CacheMissError and the
 * snapshot errors are recovered by the source resolver. Per-record problems
 * are values (see RecordRejection), not errors.
 */

interface AppErrorOptions {
  details?: unknown
  cause?: unknown
}

export class AppError extends Error {
  readonly code: string
  readonly details?: unknown

  constructor(message: string, code: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause })
    this.name = this.constructor.name
    this.code = code
    this.details = options.details
    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Required configuration (usually a credential) is absent or invalid.
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', { details })
  }
}

/**
 * The ledger rejected the credential. Never retried.
 */
export class AuthError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'AUTH_ERROR', { details })
  }
}

/**
 * Network failure, timeout or rate limit. Retryable.
 */
export class TransientError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, 'TRANSIENT_ERROR', options)
  }
}

/**
 * A live fetch could not complete (retries exhausted, or a non-retryable response).
 */
export class FetchError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, 'FETCH_ERROR', options)
  }
}

export type CacheTier = 'remote' | 'local'

/**
 * A cache tier had nothing usable. Caught by the source resolver.
 */
export class CacheMissError extends AppError {
  constructor(
    readonly tier: CacheTier,
    message: string,
    cause?: unknown
  ) {
    super(message, 'CACHE_MISS', { cause, details: { tier } })
  }
}

export class SnapshotStoreError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, 'SNAPSHOT_IO_ERROR', options)
  }
}

export class SnapshotNotFoundError extends AppError {
  constructor(name: string) {
    super(`Snapshot ${name} not found`, 'SNAPSHOT_NOT_FOUND', { details: { name } })
  }
}

export class SnapshotFormatError extends AppError {
  constructor(message: string, cause?: unknown) {
    super(message, 'SNAPSHOT_FORMAT_ERROR', { cause })
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError

/**
 * Extracts a printable message from anything thrown.
 */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
