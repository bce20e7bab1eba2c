import type { Duration, UnixMs } from "@ward/clock"

/**
 * Read-only view of one logical execution, shared by every attempt.
 */
export interface ExecutionContext {
  /** Clock reading when the execution was created */
  readonly startTime: UnixMs

  /** Attempts recorded so far; 0 before the first `complete()` */
  readonly attempts: number

  /** Time since `startTime` */
  elapsedTime(): Duration
}
