import type { Duration } from "@ward/clock"

/** `maxRetries` value meaning "no limit". */
export const UNLIMITED_RETRIES = -1

/**
 * Retry rules consulted once per attempt.
 *
 * @remarks
 * Every member is a pure query; the engine never mutates the policy and may
 * read it from many executions at once.
 *
 * Wait time starts at `delay`. When `maxDelay` is set, it is multiplied by
 * `delayMultiplier` after every attempt and capped at `maxDelay`; without
 * `maxDelay` it stays constant (apart from the `maxDuration` clamp).
 */
export interface RetryPolicy<R = unknown, E = Error> {
  /** Base wait between attempts */
  readonly delay: Duration

  /** Backoff ceiling; enables backoff when set */
  readonly maxDelay?: Duration

  /** Backoff growth factor, applied only when `maxDelay` is set */
  readonly delayMultiplier: number

  /** Budget for the whole execution, measured from its start */
  readonly maxDuration?: Duration

  /**
   * Retries allowed after the first attempt, or {@link UNLIMITED_RETRIES}.
   * maxRetries=2 → up to 3 attempts.
   */
  readonly maxRetries: number

  /** Terminal outcome: stop now, whatever budget is left */
  canAbortFor(result: R | undefined, failure: E | undefined): boolean

  /** Outcome worth another attempt */
  canRetryFor(result: R | undefined, failure: E | undefined): boolean
}
