import type { LoggerHarness } from "./logger-harness"

export function describeLoggerContract(h: LoggerHarness) {
  describe(`Logger contract: ${h.name}`, () => {
    it("writes the message and meta", () => {
      const { logger, entries } = h.create("trace")

      logger.debug("backoff delay computed", { attempt: 1, retries: 4, delayMs: 200 })

      expect(entries).toEqual([
        {
          level: "debug",
          message: "backoff delay computed",
          fields: { attempt: 1, retries: 4, delayMs: 200 },
        },
      ])
    })

    it("child() inherits parent context and adds its own", () => {
      const { logger, entries } = h.create("trace")

      logger.child({ module: "backoff" }).child({ retries: 5 }).debug("backoff exhausted")

      expect(entries).toHaveLength(1)
      expect(entries[0]?.fields).toEqual({ module: "backoff", retries: 5 })
    })

    it("child() overrides on key conflict", () => {
      const { logger, entries } = h.create("trace")

      logger.child({ module: "retry-loop" }).child({ module: "backoff" }).info("hello")

      expect(entries[0]?.fields.module).toBe("backoff")
    })

    it("child() leaves the parent untouched", () => {
      const { logger, entries } = h.create("trace")

      const parent = logger.child({ module: "backoff" })
      parent.child({ retries: 5 })
      parent.info("parent")

      expect(entries[0]?.fields).toEqual({ module: "backoff" })
    })

    it("per-call meta overrides context", () => {
      const { logger, entries } = h.create("trace")

      logger.child({ attempt: 0 }).debug("backoff delay computed", { attempt: 2 })

      expect(entries[0]?.fields.attempt).toBe(2)
    })

    it("drops entries below the configured level", () => {
      const { logger, entries } = h.create("warn")

      logger.trace("trace")
      logger.debug("debug")
      logger.info("info")
      logger.warn("warn")
      logger.error("error")
      logger.fatal("fatal")

      expect(entries.map((e) => e.level)).toEqual(["warn", "error", "fatal"])
    })
  })
}
