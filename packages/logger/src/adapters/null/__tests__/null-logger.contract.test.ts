import { Levels } from "@plugkit/level"
import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger contract", () => {
  it("never throws for any method", () => {
    const logger = new NullLogger()

    expect(() => logger.trace("x")).not.toThrow()
    expect(() => logger.debug("x")).not.toThrow()
    expect(() => logger.info("x")).not.toThrow()
    expect(() => logger.warn("x")).not.toThrow()
    expect(() => logger.error("x")).not.toThrow()
    expect(() => logger.log(Levels.Error + 3, "x")).not.toThrow()
  })

  it("reports every level as disabled", () => {
    expect(createNullLogger().enabled(Levels.Error + 100)).toBe(false)
  })

  it("child() returns a logger and remains a no-op", () => {
    const child = new NullLogger().child({ plugin: "echo" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(() => child.info("x")).not.toThrow()
  })
})
