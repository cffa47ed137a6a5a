import { createNullLogger } from "../null-logger"

describe("createNullLogger", () => {
  it("accepts every level", () => {
    const logger = createNullLogger()

    expect(logger.trace("x")).toBeUndefined()
    expect(logger.debug("backoff delay computed", { attempt: 0, delayMs: 100 })).toBeUndefined()
    expect(logger.info("x")).toBeUndefined()
    expect(logger.warn("x")).toBeUndefined()
    expect(logger.error("x", { err: new Error("boom") })).toBeUndefined()
    expect(logger.fatal("x")).toBeUndefined()
  })

  it("returns a fresh discarding logger from child()", () => {
    const parent = createNullLogger()
    const child = parent.child({ module: "backoff" })

    expect(child).not.toBe(parent)
    expect(() => child.child({ retries: 3 }).debug("backoff exhausted")).not.toThrow()
  })
})
