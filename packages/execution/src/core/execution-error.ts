import { BaseError } from "@ward/errors"

export type ExecutionErrorCode = "invalid_configuration" | "illegal_state"

/**
 * Contract violations raised by the engine itself. Never retryable and
 * never operational: each one means the caller misused the API.
 */
export class ExecutionError extends BaseError<ExecutionErrorCode> {
  static invalidConfiguration(
    message: string,
    context: Record<string, unknown> = {},
  ): ExecutionError {
    return new ExecutionError(message, {
      code: "invalid_configuration",
      context,
      isRetryable: false,
      isOperational: false,
    })
  }

  static alreadyCompleted(input: { attempts: number }): ExecutionError {
    return new ExecutionError("Execution has already been completed", {
      code: "illegal_state",
      context: { attempts: input.attempts },
      isRetryable: false,
      isOperational: false,
    })
  }
}
