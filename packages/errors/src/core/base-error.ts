import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isRetryable?: boolean
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isRetryable: boolean
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })

    this.name = new.target.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isRetryable = options.isRetryable ?? false
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    Error.captureStackTrace?.(this, new.target)
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean

  /** Stop following `cause` after this many levels. Default: 10 */
  maxCauseDepth?: number
}>

/**
 * Serialize any thrown value to a consistent shape.
 *
 * - BaseError keeps its code, context and flags
 * - other Errors get code "unknown" and are treated as non-operational
 * - non-Error values are wrapped, with the raw value kept in context
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  return serializeAt(err, options ?? {}, 0)
}

function serializeAt(err: unknown, options: SerializeOptions, depth: number): SerializedError {
  const includeStack = options.includeStack ?? false
  const maxCauseDepth = options.maxCauseDepth ?? 10

  const causeOf = (cause: unknown) =>
    cause !== undefined && depth < maxCauseDepth
      ? { cause: serializeAt(cause, options, depth + 1) }
      : {}

  if (err instanceof BaseError) {
    return {
      name: err.name,
      code: err.code,
      message: err.message,
      context: { ...err.context },
      isRetryable: err.isRetryable,
      isOperational: err.isOperational,
      timestamp: err.timestamp.toISOString(),
      ...causeOf(err.cause),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      code: "unknown",
      message: err.message,
      context: {},
      isRetryable: false,
      isOperational: false,
      timestamp: new Date().toISOString(),
      ...causeOf(err.cause),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isRetryable: false,
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
