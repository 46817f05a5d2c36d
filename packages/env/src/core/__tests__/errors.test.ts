import {
  CustomConverterError,
  EnvParseError,
  NotAStructPtrError,
  RequiredNotSetError,
  UnrecognizedOptionError,
} from "../errors"

describe("env errors", () => {
  it("joins aggregated messages with a period and a space", () => {
    const error = new EnvParseError([
      new UnrecognizedOptionError("secret", "TOKEN"),
      new RequiredNotSetError("PORT", "APP_PORT"),
    ])

    expect(error.message).toBe(
      'env tag option "secret" not supported. required environment variable "PORT" is not set',
    )
    expect(error.code).toBe("env_parse_failed")
    expect(Object.isFrozen(error.errors)).toBe(true)
  })

  it("serializes every aggregated error", () => {
    const error = new EnvParseError([new RequiredNotSetError("PORT", "APP_PORT")])

    expect(error.toJSON()).toMatchObject({
      code: "env_parse_failed",
      context: { errorCount: 1 },
      errors: [
        {
          name: "RequiredNotSetError",
          code: "required_not_set",
          context: { key: "PORT", effectiveKey: "APP_PORT" },
        },
      ],
    })
  })

  it("describes the rejected target", () => {
    expect(new NotAStructPtrError([]).context).toEqual({ received: "array" })
    expect(new NotAStructPtrError(Object.freeze({})).context).toEqual({ received: "frozen object" })
    expect(new NotAStructPtrError(null).isOperational).toBe(false)
  })

  it("keeps the converter failure as the cause", () => {
    const cause = new Error("bad region")
    const error = new CustomConverterError("Region", cause)

    expect(error.message).toBe("Custom parser error: bad region")
    expect(error.cause).toBe(cause)
    expect(new CustomConverterError("Region", "plain").message).toBe("Custom parser error: plain")
  })
})
