import { CustomConverterError, UnsupportedSliceTypeError, UnsupportedTypeError } from "../../errors"
import { type TextUnmarshaler, Types } from "../../schema/type-key"
import { CustomConverters } from "../converters"
import { ConverterRegistry } from "../registry"

class Level implements TextUnmarshaler {
  value = "info"

  unmarshalText(text: string): void {
    if (!["debug", "info", "warn"].includes(text)) throw new Error(`unknown level "${text}"`)
    this.value = text
  }
}

type Color = { r: number; g: number; b: number }

const LevelType = Types.text("Level", () => new Level())
const ColorType = Types.custom<Color>("Color")

function hexColor(raw: string): Color {
  const match = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(raw)
  if (!match) throw new Error(`not a hex color: ${raw}`)

  const [, r = "", g = "", b = ""] = match
  return { r: Number.parseInt(r, 16), g: Number.parseInt(g, 16), b: Number.parseInt(b, 16) }
}

describe("ConverterRegistry", () => {
  describe("built-ins", () => {
    it("converts scalars", () => {
      const registry = new ConverterRegistry()

      expect(registry.convert(Types.int, "42")).toBe(42)
      expect(registry.convert(Types.bool, "true")).toBe(true)
    })

    it("converts sequences with the given separator", () => {
      const registry = new ConverterRegistry()

      expect(registry.convert(Types.listOf(Types.int), "1;2;3", { separator: ";" })).toEqual([
        1, 2, 3,
      ])
    })

    it("fails opaque types without a converter", () => {
      const registry = new ConverterRegistry()

      expect(() => registry.convert(ColorType, "#ffffff")).toThrow(UnsupportedTypeError)
    })

    it("fails sequences of unsupported element types", () => {
      const registry = new ConverterRegistry()

      expect(() => registry.convert(Types.listOf(Types.listOf(Types.int)), "1")).toThrow(
        UnsupportedSliceTypeError,
      )
    })
  })

  describe("text types", () => {
    it("decode into the current value when it can decode itself", () => {
      const registry = new ConverterRegistry()
      const current = new Level()

      const result = registry.convert(LevelType, "debug", { current })

      expect(result).toBe(current)
      expect(current.value).toBe("debug")
    })

    it("decode into a fresh instance otherwise", () => {
      const registry = new ConverterRegistry()

      const result = registry.convert(LevelType, "warn", { current: undefined })

      expect(result).toBeInstanceOf(Level)
      expect(result).toMatchObject({ value: "warn" })
    })

    it("report decode failures as conversion errors", () => {
      const registry = new ConverterRegistry()

      expect(() => registry.convert(LevelType, "loud")).toThrow(
        expect.objectContaining({
          code: "conversion_failed",
          message: 'unknown level "loud"',
          isOperational: true,
          context: { typeId: "Level" },
        }),
      )
    })
  })

  describe("custom converters", () => {
    it("produce opaque types", () => {
      const registry = new ConverterRegistry(new CustomConverters().set(ColorType, hexColor))

      expect(registry.convert(ColorType, "#ff8000")).toEqual({ r: 255, g: 128, b: 0 })
    })

    it("shadow the built-in conversion for the same type id", () => {
      const registry = new ConverterRegistry(
        new CustomConverters().set(Types.duration, (raw) => Number(raw) * 1000),
      )

      expect(registry.convert(Types.duration, "5")).toBe(5000)
      expect(registry.convert(Types.int, "5")).toBe(5)
    })

    it("wrap failures as CustomConverterError", () => {
      const registry = new ConverterRegistry(new CustomConverters().set(ColorType, hexColor))

      expect(() => registry.convert(ColorType, "red")).toThrow(CustomConverterError)
      expect(() => registry.convert(ColorType, "red")).toThrow(
        "Custom parser error: not a hex color: red",
      )
    })
  })
})

describe("CustomConverters", () => {
  it("keeps one converter per type id", () => {
    const first = (raw: string) => raw
    const second = (raw: string) => raw.trim()
    const converters = new CustomConverters().set(Types.string, first).set(Types.string, second)

    expect(converters.size).toBe(1)
    expect(converters.get("string")).toBe(second)
    expect(converters.has("int")).toBe(false)
  })
})
