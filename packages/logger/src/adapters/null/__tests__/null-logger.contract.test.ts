import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger", () => {
  it("accepts every level without throwing", () => {
    const logger = createNullLogger()

    expect(() => {
      logger.trace("environment field set", { field: "port" })
      logger.debug("environment parsed", { fieldCount: 1, errorCount: 0 })
      logger.info("environment parsed")
      logger.warn("onFieldSet hook failed", { err: new Error("x") })
      logger.error("environment parse failed", { errorCount: 2 })
      logger.fatal("environment parse failed")
    }).not.toThrow()
  })

  it("child() returns a fresh NullLogger", () => {
    const parent = createNullLogger()
    const child = parent.child({ module: "envbind" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(child).not.toBe(parent)
  })
})
