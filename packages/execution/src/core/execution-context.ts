import type { Clock, Duration, UnixMs } from "@ward/clock"
import type { ExecutionContext } from "../ports/execution-context"

export class BaseExecutionContext implements ExecutionContext {
  readonly startTime: UnixMs
  private attemptCount = 0

  constructor(protected readonly clock: Clock) {
    this.startTime = clock.nowMs()
  }

  get attempts(): number {
    return this.attemptCount
  }

  elapsedTime(): Duration {
    return { milliseconds: this.clock.nowMs() - this.startTime }
  }

  /** Counts one more attempt and returns the new total. */
  protected recordAttempt(): number {
    this.attemptCount += 1
    return this.attemptCount
  }
}
