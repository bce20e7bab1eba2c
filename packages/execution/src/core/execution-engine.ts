import { type Clock, type Duration, type Milliseconds, SystemClock } from "@ward/clock"
import { type Logger, NullLogger } from "@ward/logger"
import type { CircuitBreaker } from "../ports/circuit-breaker"
import type { IExecutionEngine } from "../ports/execution-engine"
import type { ExecutionListeners } from "../ports/listeners"
import { type RetryPolicy, UNLIMITED_RETRIES } from "../ports/retry-policy"
import { BaseExecutionContext } from "./execution-context"
import { ExecutionError } from "./execution-error"

export type ExecutionCollaborators<R, E> = {
  retryPolicy: RetryPolicy<R, E>
  circuitBreaker?: CircuitBreaker<R, E>
  listeners?: ExecutionListeners<R, E>
}

export type ExecutionEngineDeps = {
  /** Default: SystemClock */
  clock?: Clock

  /** Default: NullLogger */
  logger?: Logger
}

type Decision = {
  attempt: number
  elapsedMs: Milliseconds
  retriesExceeded: boolean
  shouldAbort: boolean
  shouldRetry: boolean
}

export function createExecutionEngine<R = unknown, E = Error>(
  collaborators: ExecutionCollaborators<R, E>,
  deps: ExecutionEngineDeps = {},
): IExecutionEngine<R, E> {
  return new ExecutionEngine(collaborators, deps)
}

/**
 * Turns the outcome of each attempt into a verdict for the whole execution:
 * finished or not, how long to wait, and what the circuit breaker and
 * listeners get told.
 *
 * @remarks
 * An engine serves exactly one execution. `complete()` may be called once
 * per attempt until it returns true; after that it throws.
 */
export class ExecutionEngine<R = unknown, E = Error>
  extends BaseExecutionContext
  implements IExecutionEngine<R, E>
{
  protected readonly retryPolicy: RetryPolicy<R, E>
  protected readonly circuitBreaker: CircuitBreaker<R, E> | undefined
  protected readonly listeners: ExecutionListeners<R, E> | undefined
  protected readonly logger: Logger

  private attemptStartTime: Milliseconds
  private lastResult: R | undefined
  private lastFailure: E | undefined
  private completed = false
  private success = false
  private retriesExceeded = false
  private waitMs: Milliseconds

  constructor(collaborators: ExecutionCollaborators<R, E>, deps: ExecutionEngineDeps = {}) {
    super(deps.clock ?? new SystemClock())

    const { retryPolicy, circuitBreaker, listeners } = collaborators
    ExecutionEngine.validatePolicy(retryPolicy)

    this.retryPolicy = retryPolicy
    this.circuitBreaker = circuitBreaker
    this.listeners = listeners
    this.logger = deps.logger ?? new NullLogger()
    this.attemptStartTime = this.startTime
    this.waitMs = retryPolicy.delay.milliseconds
  }

  private static validatePolicy<R, E>(policy: RetryPolicy<R, E> | undefined): void {
    if (!policy) {
      throw ExecutionError.invalidConfiguration("retryPolicy is required")
    }

    const delayMs = policy.delay.milliseconds
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw ExecutionError.invalidConfiguration(
        `delay must be a finite number >= 0 (got ${delayMs})`,
        { delayMs },
      )
    }

    const { maxRetries } = policy
    if (maxRetries !== UNLIMITED_RETRIES && (!Number.isInteger(maxRetries) || maxRetries < 0)) {
      throw ExecutionError.invalidConfiguration(
        `maxRetries must be an integer >= 0 or UNLIMITED_RETRIES (got ${maxRetries})`,
        { maxRetries },
      )
    }
  }

  isComplete(): boolean {
    return this.completed
  }

  isSuccessful(): boolean {
    return this.success
  }

  hasExceededRetries(): boolean {
    return this.retriesExceeded
  }

  getWaitTime(): Duration {
    return { milliseconds: this.waitMs }
  }

  getLastResult(): R | undefined {
    return this.lastResult
  }

  getLastFailure(): E | undefined {
    return this.lastFailure
  }

  before(): void {
    this.circuitBreaker?.before()
    this.attemptStartTime = this.clock.nowMs()
  }

  complete(
    result: R | undefined,
    failure: E | undefined,
    checkRetryConditions = true,
  ): boolean {
    if (this.completed) {
      throw ExecutionError.alreadyCompleted({ attempts: this.attempts })
    }

    const attempt = this.recordAttempt()
    this.lastResult = result
    this.lastFailure = failure

    const now = this.clock.nowMs()
    const elapsedMs = now - this.startTime

    this.recordWithCircuitBreaker(result, failure, now - this.attemptStartTime)
    this.clampWaitToMaxDuration(elapsedMs)
    this.applyBackoff()

    const retriesExceeded = this.isRetryBudgetSpent(attempt, elapsedMs)
    const shouldAbort = this.retryPolicy.canAbortFor(result, failure)
    const shouldRetry =
      !retriesExceeded &&
      !shouldAbort &&
      checkRetryConditions &&
      this.retryPolicy.canRetryFor(result, failure)

    this.retriesExceeded = retriesExceeded
    this.completed = shouldAbort || !shouldRetry
    this.success = this.completed && !shouldRetry && !shouldAbort && failure == null

    const decision: Decision = { attempt, elapsedMs, retriesExceeded, shouldAbort, shouldRetry }
    this.logDecision(decision, failure)
    this.notifyListeners(result, failure, decision)

    return this.completed
  }

  /**
   * Feeds the breaker before any retry decision, so aborted and exhausted
   * attempts are counted too.
   */
  private recordWithCircuitBreaker(
    result: R | undefined,
    failure: E | undefined,
    attemptElapsedMs: Milliseconds,
  ): void {
    const breaker = this.circuitBreaker
    if (!breaker) return

    const timeoutExceeded =
      breaker.timeout !== undefined && attemptElapsedMs >= breaker.timeout.milliseconds

    if (breaker.isFailure(result, failure) || timeoutExceeded) {
      breaker.recordFailure()
    } else {
      breaker.recordSuccess()
    }
  }

  private clampWaitToMaxDuration(elapsedMs: Milliseconds): void {
    const { maxDuration } = this.retryPolicy
    if (maxDuration === undefined) return

    const remainingMs = maxDuration.milliseconds - elapsedMs
    this.waitMs = Math.min(this.waitMs, Math.max(remainingMs, 0))
  }

  // Grows the already clamped wait.
  private applyBackoff(): void {
    const { maxDelay, delayMultiplier } = this.retryPolicy
    if (maxDelay === undefined) return

    this.waitMs = Math.min(this.waitMs * delayMultiplier, maxDelay.milliseconds)
  }

  private isRetryBudgetSpent(attempt: number, elapsedMs: Milliseconds): boolean {
    const { maxRetries, maxDuration } = this.retryPolicy

    const maxRetriesExceeded = maxRetries !== UNLIMITED_RETRIES && attempt > maxRetries
    const maxDurationExceeded =
      maxDuration !== undefined && elapsedMs > maxDuration.milliseconds

    return maxRetriesExceeded || maxDurationExceeded
  }

  private logDecision(decision: Decision, failure: E | undefined): void {
    this.logger.debug("Execution attempt recorded", {
      module: "execution",
      attempt: decision.attempt,
      elapsedMs: decision.elapsedMs,
      waitMs: this.waitMs,
      shouldRetry: decision.shouldRetry,
      shouldAbort: decision.shouldAbort,
      retriesExceeded: decision.retriesExceeded,
      completed: this.completed,
      success: this.success,
      ...(failure != null && { err: failure }),
    })
  }

  private notifyListeners(
    result: R | undefined,
    failure: E | undefined,
    decision: Decision,
  ): void {
    const listeners = this.listeners
    if (!listeners) return

    if (!this.success) {
      listeners.onFailedAttempt?.(result, failure, this)
    }

    if (decision.shouldAbort) {
      listeners.onAbort?.(result, failure, this)
      return
    }

    if (decision.retriesExceeded) {
      listeners.onRetriesExceeded?.(result, failure, this)
    }

    if (this.completed) {
      listeners.onComplete?.(result, failure, this, this.success)
    }
  }
}
