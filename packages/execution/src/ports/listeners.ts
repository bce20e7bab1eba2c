import type { ExecutionContext } from "./execution-context"

/**
 * Notifications fired from `complete()`, in this order:
 *
 * 1. `onFailedAttempt` unless the attempt succeeded
 * 2. `onAbort` when the policy aborts, and nothing after it
 * 3. otherwise `onRetriesExceeded` when the retry budget ran out, then
 *    `onComplete` when the execution finished
 *
 * @remarks
 * Listeners run synchronously inside `complete()` and their return values
 * are ignored. A listener that throws aborts the dispatch and the error
 * propagates to the caller of `complete()`.
 */
export interface ExecutionListeners<R = unknown, E = Error> {
  onFailedAttempt?(result: R | undefined, failure: E | undefined, ctx: ExecutionContext): void
  onAbort?(result: R | undefined, failure: E | undefined, ctx: ExecutionContext): void
  onRetriesExceeded?(
    result: R | undefined,
    failure: E | undefined,
    ctx: ExecutionContext,
  ): void
  onComplete?(
    result: R | undefined,
    failure: E | undefined,
    ctx: ExecutionContext,
    success: boolean,
  ): void
}
