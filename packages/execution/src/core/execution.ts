import type { ExecutionCollaborators, ExecutionEngineDeps } from "./execution-engine"
import { ExecutionEngine } from "./execution-engine"

/**
 * Execution for callers that run their own attempt loop.
 *
 * @example
 * ```ts
 * const execution = createExecution<Invoice, unknown>({ retryPolicy })
 *
 * while (true) {
 *   execution.before()
 *   try {
 *     const value = await fetchInvoice(id)
 *     if (!execution.canRetryFor(value)) break
 *   } catch (err) {
 *     if (!execution.canRetryOn(err)) break
 *   }
 *   await clock.sleep(execution.getWaitTime().milliseconds)
 * }
 * ```
 */
export class Execution<R = unknown, E = Error> extends ExecutionEngine<R, E> {
  /** Records the attempt; true when another attempt should follow. */
  canRetryFor(result: R | undefined, failure?: E): boolean {
    return !this.complete(result, failure, true)
  }

  /** Records a failed attempt; true when another attempt should follow. */
  canRetryOn(failure: E): boolean {
    return !this.complete(undefined, failure, true)
  }

  /** Records the attempt and completes the execution whatever the policy says. */
  finish(result?: R, failure?: E): void {
    this.complete(result, failure, false)
  }
}

export function createExecution<R = unknown, E = Error>(
  collaborators: ExecutionCollaborators<R, E>,
  deps: ExecutionEngineDeps = {},
): Execution<R, E> {
  return new Execution(collaborators, deps)
}
