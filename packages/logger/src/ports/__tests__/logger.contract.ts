import { Levels } from "@plugkit/level"
import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("child() inherits parent context and adds child context", () => {
      const { logger, read } = h.make({ level: Levels.Trace })

      logger.child({ plugin: "echo" }).child({ command: "greet" }).info("hello")

      const logs = read()

      expect(logs).toHaveLength(1)
      expect(logs[0]?.payload).toMatchObject({ plugin: "echo", command: "greet" })
    })

    it("child() overrides on key conflict (shallow)", () => {
      const { logger, read } = h.make({ level: Levels.Trace })

      logger.child({ task: "link" }).child({ task: "copy" }).info("hello")

      expect(read()[0]?.payload.task).toBe("copy")
    })

    it("child() does not mutate the parent", () => {
      const { logger, read, clear } = h.make({ level: Levels.Trace })

      const parent = logger.child({ plugin: "echo" })
      const child = parent.child({ command: "greet" })

      parent.info("parent")
      child.info("child")

      const logs = read()

      expect(logs).toHaveLength(2)
      expect(logs[0]?.payload).toMatchObject({ plugin: "echo" })
      expect(logs[0]?.payload).not.toHaveProperty("command")
      expect(logs[1]?.payload).toMatchObject({ plugin: "echo", command: "greet" })

      clear()

      expect(read()).toEqual([])
    })

    it("per-call meta merges with context (meta overrides)", () => {
      const { logger, read } = h.make({ level: Levels.Trace })

      logger.child({ task: "link" }).info("hello", { task: "copy" })

      expect(read()[0]?.payload.task).toBe("copy")
    })

    it("named methods log at the named levels", () => {
      const { logger, read } = h.make({ level: Levels.Trace })

      logger.trace("t")
      logger.debug("d")
      logger.info("i")
      logger.warn("w")
      logger.error("e")

      expect(read().map((l) => l.level)).toEqual(["TRACE", "DEBUG", "INFO", "WARN", "ERROR"])
    })

    it("log() writes levels between and beyond the named ones", () => {
      const { logger, read } = h.make({ level: Levels.Trace - 10 })

      logger.log(Levels.Info + 2, "a")
      logger.log(Levels.Warn - 1, "b")
      logger.log(Levels.Trace - 3, "c")
      logger.log(Levels.Error + 4, "d")

      expect(read().map((l) => l.level)).toEqual(["INFO+2", "INFO+3", "TRACE-3", "ERROR+4"])
    })

    it("suppresses records below the configured minimum", () => {
      const { logger, read } = h.make({ level: Levels.Warn })

      logger.info("info")
      logger.log(Levels.Warn - 1, "just below")
      logger.warn("warn")
      logger.error("error")

      expect(read().map((l) => l.level)).toEqual(["WARN", "ERROR"])
    })

    it("honors a minimum between named levels", () => {
      const { logger, read } = h.make({ level: Levels.Info + 2 })

      logger.info("dropped")
      logger.log(Levels.Info + 1, "dropped")
      logger.log(Levels.Info + 2, "kept")
      logger.warn("kept")

      expect(read().map((l) => l.level)).toEqual(["INFO+2", "WARN"])
    })

    it("enabled() reports the filter decision", () => {
      const { logger } = h.make({ level: Levels.Debug })

      expect(logger.enabled(Levels.Trace)).toBe(false)
      expect(logger.enabled(Levels.Debug - 1)).toBe(false)
      expect(logger.enabled(Levels.Debug)).toBe(true)
      expect(logger.enabled(Levels.Error + 100)).toBe(true)
      expect(logger.child({ plugin: "echo" }).enabled(Levels.Trace)).toBe(false)
    })
  })
}
