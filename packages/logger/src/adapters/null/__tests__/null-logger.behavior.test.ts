import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger behavior", () => {
  it("never throws for any method", () => {
    const logger = new NullLogger()
    const err = new Error("ignored")

    expect(() => logger.trace("x")).not.toThrow()
    expect(() => logger.debug("x", { attempt: 1 })).not.toThrow()
    expect(() => logger.info("x")).not.toThrow()
    expect(() => logger.warn("x")).not.toThrow()
    expect(() => logger.error("x", { err })).not.toThrow()
    expect(() => logger.fatal("x")).not.toThrow()
  })

  it("child() returns another NullLogger", () => {
    const child = createNullLogger().child({ executionId: "exec-1" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(() => child.info("x")).not.toThrow()
  })
})
