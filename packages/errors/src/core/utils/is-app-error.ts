import type { AppError } from "../../ports/error"

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural check for {@link AppError}, so errors raised by another copy
 * of this package are still recognised.
 *
 * @example
 * ```ts
 * try {
 *   engine.complete(result, undefined)
 * } catch (err) {
 *   if (isAppError(err) && !err.isOperational) throw err
 * }
 * ```
 */
export function isAppError(e: unknown): e is AppError {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    e.code === e.code.toLowerCase() &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
