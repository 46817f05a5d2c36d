import { MemoryEnvStore } from "../../../adapters/memory/memory-env-store"
import { RequiredNotSetError, UnrecognizedOptionError } from "../../errors"
import { field } from "../../schema/field"
import { resolveField } from "../field-resolver"

function storeWith(env: Record<string, string> = {}) {
  return new MemoryEnvStore({ env })
}

describe("resolveField", () => {
  it("reads the variable under the prefixed key", () => {
    const store = storeWith({ APP_PORT: "3000", PORT: "1" })

    expect(resolveField(field.int({ env: "PORT" }), store, "APP_")).toEqual({
      kind: "value",
      key: "APP_PORT",
      raw: "3000",
    })
  })

  it("falls back to the default literal", () => {
    expect(resolveField(field.int({ env: "PORT", default: "8080" }), storeWith())).toEqual({
      kind: "value",
      key: "PORT",
      raw: "8080",
    })
  })

  it("prefers an explicitly empty variable over the default", () => {
    const store = storeWith({ PORT: "" })

    expect(resolveField(field.int({ env: "PORT", default: "8080" }), store)).toEqual({
      kind: "empty",
      key: "PORT",
    })
  })

  it("reports unset fields without a default as empty", () => {
    expect(resolveField(field.string({ env: "HOST" }), storeWith())).toEqual({
      kind: "empty",
      key: "HOST",
    })
  })

  describe("required", () => {
    it("ignores the default", () => {
      const resolution = resolveField(
        field.string({ env: "TOKEN,required", default: "test-secret" }),
        storeWith(),
        "APP_",
      )

      expect(resolution.kind).toBe("error")
      if (resolution.kind !== "error") return
      expect(resolution.error).toBeInstanceOf(RequiredNotSetError)
      expect(resolution.error.message).toBe('required environment variable "TOKEN" is not set')
      expect(resolution.error.context).toEqual({ key: "TOKEN", effectiveKey: "APP_TOKEN" })
    })

    it("is satisfied by an empty variable", () => {
      const store = storeWith({ TOKEN: "" })

      expect(resolveField(field.string({ env: "TOKEN,required" }), store)).toEqual({
        kind: "empty",
        key: "TOKEN",
      })
    })

    it("returns the variable when set", () => {
      const store = storeWith({ TOKEN: "test-secret" })

      expect(resolveField(field.string({ env: "TOKEN,required" }), store)).toEqual({
        kind: "value",
        key: "TOKEN",
        raw: "test-secret",
      })
    })
  })

  it("rejects unknown options before looking anything up", () => {
    const store = storeWith()
    const read = vi.spyOn(store, "read")

    const resolution = resolveField(field.string({ env: "TOKEN,required,secret" }), store)

    expect(resolution.kind).toBe("error")
    if (resolution.kind !== "error") return
    expect(resolution.error).toBeInstanceOf(UnrecognizedOptionError)
    expect(resolution.error.message).toBe('env tag option "secret" not supported')
    expect(read).not.toHaveBeenCalled()
  })

  it("ignores empty options", () => {
    const store = storeWith({ HOST: "db" })

    expect(resolveField(field.string({ env: "HOST,," }), store)).toMatchObject({ raw: "db" })
  })

  describe("expansion", () => {
    const store = storeWith({ HOME: "/home/test", DATA_DIR: "${HOME}/data" })

    it("substitutes variables when enabled", () => {
      expect(resolveField(field.string({ env: "DATA_DIR", expand: true }), store)).toMatchObject({
        raw: "/home/test/data",
      })
    })

    it("accepts the string flag in any case", () => {
      expect(resolveField(field.string({ env: "DATA_DIR", expand: "TRUE" }), store)).toMatchObject({
        raw: "/home/test/data",
      })
    })

    it("leaves the text alone when disabled", () => {
      expect(resolveField(field.string({ env: "DATA_DIR" }), store)).toMatchObject({
        raw: "${HOME}/data",
      })
    })

    it("applies to defaults too", () => {
      const descriptor = field.string({ env: "CACHE_DIR", default: "$HOME/.cache", expand: true })

      expect(resolveField(descriptor, store)).toMatchObject({ raw: "/home/test/.cache" })
    })

    it("does not apply to required fields", () => {
      const descriptor = field.string({ env: "DATA_DIR,required", expand: true })

      expect(resolveField(descriptor, store)).toEqual({
        kind: "value",
        key: "DATA_DIR",
        raw: "${HOME}/data",
      })
    })

    it("yields empty when everything expands to nothing", () => {
      const descriptor = field.string({ env: "X", default: "$MISSING", expand: true })

      expect(resolveField(descriptor, store)).toEqual({ kind: "empty", key: "X" })
    })
  })
})
