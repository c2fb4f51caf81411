/**
 * Collector error taxonomy.
 *
 * Operational errors are expected conditions with a defined policy
 * (skip, count, abort). Anything else reaching the CLI is a bug.
 */

import type { CollectionRun } from '../collector/run.js'

export const ERROR_CODES = {
  INVALID_URL: 'INVALID_URL',
  STORE_UNAVAILABLE: 'STORE_UNAVAILABLE',
  STORE_WRITE_FAILED: 'STORE_WRITE_FAILED',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  USAGE_ERROR: 'USAGE_ERROR',
  ILLEGAL_TRANSITION: 'ILLEGAL_TRANSITION',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

export abstract class CollectorError extends Error {
  abstract readonly code: ErrorCode
  readonly isOperational: boolean = true

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Candidate URL could not be parsed or is not http(s). Skipped and counted. */
export class InvalidUrlError extends CollectorError {
  readonly code = ERROR_CODES.INVALID_URL

  constructor(
    readonly url: string,
    reason: string
  ) {
    super(`Invalid URL "${url.slice(0, 120)}": ${reason}`)
  }
}

/** The store cannot be reached. Aborts the run. */
export class StoreUnavailableError extends CollectorError {
  readonly code = ERROR_CODES.STORE_UNAVAILABLE

  constructor(
    readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(`Store unavailable during ${operation}: ${describeCause(options?.cause)}`, options)
  }
}

/**
 * The store went away mid-run. Carries the partial run so the CLI can still
 * print its summary.
 */
export class RunAbortedError extends StoreUnavailableError {
  constructor(
    readonly run: CollectionRun,
    cause: StoreUnavailableError
  ) {
    super(cause.operation, { cause: cause.cause })
  }
}

/** A record write partially or wholly failed. Logged; the run continues. */
export class StoreWriteError extends CollectorError {
  readonly code = ERROR_CODES.STORE_WRITE_FAILED

  constructor(
    readonly fingerprint: string,
    readonly committed: readonly string[],
    readonly failed: readonly string[],
    options?: { cause?: unknown }
  ) {
    super(
      `Write for ${fingerprint.slice(0, 16)} failed at ${failed.join(', ')} (committed: ${committed.join(', ') || 'none'})`,
      options
    )
  }
}

export class ConfigurationError extends CollectorError {
  readonly code = ERROR_CODES.CONFIGURATION_ERROR

  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
  }
}

export class UsageError extends CollectorError {
  readonly code = ERROR_CODES.USAGE_ERROR
}

/** Markers ioredis puts in errors when the connection itself is the problem */
const CONNECTION_ERROR_MARKERS = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'Connection is closed',
  'MaxRetriesPerRequestError',
  'Reached the max retries per request limit',
  'Command timed out',
  'Stream isn\'t writeable',
]

export function isConnectionError(error: unknown): boolean {
  if (!(error instanceof Error)) return false
  const text = `${error.name} ${error.message}`
  return CONNECTION_ERROR_MARKERS.some((marker) => text.includes(marker))
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  if (cause === undefined) return 'unknown error'
  return String(cause)
}

/**
 * Exit code for an error that escaped the run.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof UsageError) return 2
  return 1
}
