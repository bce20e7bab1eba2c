import { FakeClock } from "@ward/clock"
import { makeRetryPolicy, recordingListeners } from "../../tests/utils/fakes"
import { createExecution, Execution } from "../execution"
import { ExecutionEngine } from "../execution-engine"
import { ExecutionError } from "../execution-error"

describe("Execution", () => {
  let clock: FakeClock

  beforeEach(() => {
    clock = new FakeClock(0)
  })

  it("createExecution returns an Execution built on the engine", () => {
    const execution = createExecution({ retryPolicy: makeRetryPolicy() }, { clock })

    expect(execution).toBeInstanceOf(Execution)
    expect(execution).toBeInstanceOf(ExecutionEngine)
  })

  describe("canRetryFor", () => {
    it("is true for a retryable outcome", () => {
      const execution = createExecution({ retryPolicy: makeRetryPolicy() }, { clock })

      expect(execution.canRetryFor(undefined, new Error("timeout"))).toBe(true)
      expect(execution.isComplete()).toBe(false)
    })

    it("is false once the outcome completes the execution", () => {
      const execution = createExecution({ retryPolicy: makeRetryPolicy() }, { clock })

      expect(execution.canRetryFor("ok")).toBe(false)
      expect(execution.isSuccessful()).toBe(true)
      expect(execution.getLastResult()).toBe("ok")
    })
  })

  describe("canRetryOn", () => {
    it("retries failures until maxRetries is spent", () => {
      const execution = createExecution(
        { retryPolicy: makeRetryPolicy({ maxRetries: 1 }) },
        { clock },
      )
      const failure = new Error("unavailable")

      expect(execution.canRetryOn(failure)).toBe(true)
      expect(execution.canRetryOn(failure)).toBe(false)
      expect(execution.hasExceededRetries()).toBe(true)
      expect(execution.getLastFailure()).toBe(failure)
    })
  })

  describe("finish", () => {
    it("completes a retryable failure without asking the policy", () => {
      const retryPolicy = makeRetryPolicy()
      const { events, listeners } = recordingListeners()
      const execution = createExecution({ retryPolicy, listeners }, { clock })

      execution.finish(undefined, new Error("cancelled"))

      expect(execution.isComplete()).toBe(true)
      expect(execution.isSuccessful()).toBe(false)
      expect(retryPolicy.canRetryFor).not.toHaveBeenCalled()
      expect(events).toEqual([
        { kind: "failedAttempt", attempts: 1 },
        { kind: "complete", attempts: 1, success: false },
      ])
    })

    it("completes successfully with a result", () => {
      const execution = createExecution({ retryPolicy: makeRetryPolicy() }, { clock })

      execution.finish("done")

      expect(execution.isSuccessful()).toBe(true)
      expect(execution.getLastResult()).toBe("done")
    })

    it("rejects further attempts once finished", () => {
      const execution = createExecution({ retryPolicy: makeRetryPolicy() }, { clock })

      execution.finish()

      expect(() => execution.canRetryFor("late")).toThrow(ExecutionError)
      expect(() => execution.finish()).toThrow("Execution has already been completed")
    })
  })

  it("supports a caller-driven loop with backoff", async () => {
    const retryPolicy = makeRetryPolicy({
      delay: { milliseconds: 10 },
      delayMultiplier: 2,
      maxDelay: { milliseconds: 1_000 },
      maxRetries: 3,
    })
    const execution = createExecution({ retryPolicy }, { clock })
    const slept: number[] = []
    let calls = 0

    const operation = (): string => {
      calls++
      if (calls < 3) throw new Error(`failure ${calls}`)
      return "value"
    }

    for (;;) {
      execution.before()
      try {
        if (!execution.canRetryFor(operation())) break
      } catch (error) {
        if (error instanceof ExecutionError) throw error
        if (!execution.canRetryOn(error instanceof Error ? error : new Error(String(error)))) {
          break
        }
      }

      const waitMs = execution.getWaitTime().milliseconds
      slept.push(waitMs)
      await clock.sleep(waitMs)
    }

    expect(execution.isSuccessful()).toBe(true)
    expect(execution.getLastResult()).toBe("value")
    expect(execution.attempts).toBe(3)
    expect(slept).toEqual([20, 40])
    expect(execution.elapsedTime()).toEqual({ milliseconds: 60 })
  })
})
