import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Wall-clock time read from the monotonic high-resolution timer.
 *
 * `performance.now()` is anchored at `performance.timeOrigin`, so `nowMs()`
 * stays on the epoch scale but is immune to system clock adjustments.
 */
export class SystemClock implements Clock {
  now(): Date {
    return new Date(this.nowMs())
  }

  nowMs(): UnixMs {
    return performance.timeOrigin + performance.now()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return Promise.resolve()
    if (signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer)
        resolve()
      }

      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort)
        resolve()
      }, ms)

      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }
}
