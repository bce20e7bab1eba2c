import type { Duration } from "@ward/clock"
import type { ExecutionContext } from "./execution-context"

/**
 * Per-attempt decision surface handed to the driver of an execution.
 *
 * @remarks
 * Driver loop:
 * 1. `before()`
 * 2. run the guarded operation
 * 3. `complete(result, failure)`; stop when it returns true
 * 4. wait `getWaitTime()` and go back to 1
 *
 * Throwing behavior:
 * - `complete()` on a completed execution throws `illegal_state`
 * - breaker rejections and listener errors propagate as they are
 * - the guarded operation's failure is never thrown, only classified
 */
export interface IExecutionEngine<R = unknown, E = Error> extends ExecutionContext {
  before(): void

  /**
   * Records one attempt and decides whether the execution is finished.
   *
   * @param checkRetryConditions - false forces completion even when the
   *   policy would retry (cancellation, caller giving up). Default: true
   * @returns true when the execution is complete
   */
  complete(
    result: R | undefined,
    failure: E | undefined,
    checkRetryConditions?: boolean,
  ): boolean

  isComplete(): boolean

  /** True only for a completed execution whose last attempt succeeded */
  isSuccessful(): boolean

  /** True when the retry count or duration budget ran out */
  hasExceededRetries(): boolean

  getWaitTime(): Duration

  getLastResult(): R | undefined

  getLastFailure(): E | undefined
}
