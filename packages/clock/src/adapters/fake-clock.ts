import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Manually driven clock for tests.
 *
 * Time only moves through `advance()`, `set()` or `sleep()`; sleeping moves
 * virtual time forward by the requested amount and resolves immediately.
 */
export class FakeClock implements Clock {
  private time: UnixMs

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError(`advance() requires a finite ms >= 0 (got ${ms})`)
    }

    this.time += ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return

    this.time += ms
  }
}
