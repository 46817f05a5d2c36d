import { ConversionError } from "../errors"
import type { ScalarKind, ScalarValue } from "../schema/type-key"
import { parseDuration } from "./duration"
import { UriReference } from "./uri-reference"

export type ScalarConverters = { readonly [K in ScalarKind]: (raw: string) => ScalarValue[K] }

const TRUE_WORDS = new Set(["1", "t", "T", "TRUE", "true", "True"])
const FALSE_WORDS = new Set(["0", "f", "F", "FALSE", "false", "False"])

const SIGNED = /^[+-]?[0-9]+$/
const UNSIGNED = /^[0-9]+$/
const DECIMAL_FLOAT = /^[+-]?(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/
const SPECIAL_FLOAT = /^([+-]?)(inf|infinity|nan)$/i

const INT32_MIN = -(2n ** 31n)
const INT32_MAX = 2n ** 31n - 1n
const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
const UINT32_MAX = 2n ** 32n - 1n
const UINT64_MAX = 2n ** 64n - 1n

function invalid(kind: string, raw: string): ConversionError {
  return new ConversionError(`parsing ${JSON.stringify(raw)} as ${kind}: invalid syntax`, {
    raw,
    kind,
  })
}

function outOfRange(kind: string, raw: string): ConversionError {
  return new ConversionError(`parsing ${JSON.stringify(raw)} as ${kind}: value out of range`, {
    raw,
    kind,
  })
}

export function parseBool(raw: string): boolean {
  if (TRUE_WORDS.has(raw)) return true
  if (FALSE_WORDS.has(raw)) return false

  throw invalid("bool", raw)
}

function parseInteger(kind: string, raw: string, min: bigint, max: bigint): bigint {
  if (!(min < 0n ? SIGNED : UNSIGNED).test(raw)) throw invalid(kind, raw)

  const value = BigInt(raw)
  if (value < min || value > max) throw outOfRange(kind, raw)

  return value
}

function parseFloatLiteral(kind: "float32" | "float64", raw: string): number {
  const special = SPECIAL_FLOAT.exec(raw)
  if (special) {
    if (special[2]?.toLowerCase() === "nan") return Number.NaN
    return special[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY
  }

  if (!DECIMAL_FLOAT.test(raw)) throw invalid(kind, raw)

  const value = kind === "float32" ? Math.fround(Number(raw)) : Number(raw)
  if (!Number.isFinite(value)) throw outOfRange(kind, raw)

  return value
}

export const scalarConverters: ScalarConverters = {
  string: (raw) => raw,
  bool: parseBool,
  int: (raw) => Number(parseInteger("int", raw, INT32_MIN, INT32_MAX)),
  int64: (raw) => parseInteger("int64", raw, INT64_MIN, INT64_MAX),
  uint: (raw) => Number(parseInteger("uint", raw, 0n, UINT32_MAX)),
  uint64: (raw) => parseInteger("uint64", raw, 0n, UINT64_MAX),
  float32: (raw) => parseFloatLiteral("float32", raw),
  float64: (raw) => parseFloatLiteral("float64", raw),
  duration: parseDuration,
  url: (raw) => UriReference.parse(raw),
}
