import type { Duration } from "@ward/clock"

/**
 * Fault detector fed with the outcome of every attempt.
 *
 * @remarks
 * Its open/closed/half-open bookkeeping is its own business. A breaker may
 * be shared by concurrent executions and must tolerate interleaved calls.
 */
export interface CircuitBreaker<R = unknown, E = Error> {
  /**
   * Called before each attempt. Throws to reject the attempt while open;
   * the error reaches the driver untouched.
   */
  before(): void

  /** Attempts running at least this long count as failures */
  readonly timeout?: Duration

  isFailure(result: R | undefined, failure: E | undefined): boolean

  recordFailure(): void

  recordSuccess(): void
}
