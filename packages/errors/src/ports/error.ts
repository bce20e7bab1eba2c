export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to errors (attempt counts, offending values).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Error code for programmatic handling */
  readonly code: ErrorCode

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /** `true` if repeating the failed call might succeed */
  readonly isRetryable: boolean

  /**
   * Expected runtime failure (`true`) versus a programmer error or broken
   * invariant (`false`).
   *
   * @remarks
   * A resilience layer may classify operational errors and retry them.
   * Non-operational errors mean the caller broke a contract (completing an
   * execution twice, passing no retry policy) and must not be retried.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape for logs and listeners.
 */
export type SerializedError = Readonly<{
  name: string
  code: ErrorCode
  message: string
  context: Record<string, unknown>
  timestamp: string
  isRetryable: boolean
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
