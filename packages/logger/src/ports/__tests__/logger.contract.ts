import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ service: "billing" })
      const child = parent.child({ executionId: "exec-1" })

      child.info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({
        service: "billing",
        executionId: "exec-1",
      })
    })

    it("child() does not mutate the parent", () => {
      const { logger, read } = h.make({ level: "trace" })

      const parent = logger.child({ service: "billing" })
      const child = parent.child({ executionId: "exec-1" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ service: "billing" })
      expect(logs[0]?.payload).not.toHaveProperty("executionId")
      expect(logs[1]?.payload).toMatchObject({
        service: "billing",
        executionId: "exec-1",
      })
    })

    it("per-call meta is recorded alongside context", () => {
      const { logger, read } = h.make({ level: "trace" })

      logger.child({ module: "execution" }).debug("attempt", { attempt: 2, waitMs: 200 })

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.level).toBe("debug")
      expect(logs[0]?.payload).toMatchObject({
        module: "execution",
        attempt: 2,
        waitMs: 200,
      })
    })

    it("level filtering: records below the configured minimum are suppressed", () => {
      const { logger, read } = h.make({ level: "warn" })

      logger.info("info")
      logger.warn("warn")
      logger.error("error")
      logger.fatal("fatal")

      expect(read().map((l) => l.level)).toEqual(["warn", "error", "fatal"])
    })

    it("clear() drops captured records", () => {
      const { logger, read, clear } = h.make()

      logger.error("boom")
      clear()

      expect(read()).toEqual([])
    })
  })
}
