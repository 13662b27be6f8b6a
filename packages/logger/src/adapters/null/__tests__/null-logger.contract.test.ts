import { NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("never throws", () => {
    const logger = new NullLogger()

    expect(() => logger.trace("x")).not.toThrow()
    expect(() => logger.debug("x")).not.toThrow()
    expect(() => logger.info("x")).not.toThrow()
    expect(() => logger.warn("x")).not.toThrow()
    expect(() => logger.error("x", { err: new Error("x") })).not.toThrow()
    expect(() => logger.fatal("x")).not.toThrow()
  })

  it("child() is another no-op logger", () => {
    const child = new NullLogger().child({ scope: "global" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(() => child.info("x")).not.toThrow()
  })
})
