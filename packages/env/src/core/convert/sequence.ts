import { toAppError } from "@envbind/errors"
import { UnsupportedSliceTypeError } from "../errors"
import type { TextUnmarshaler, TypeKey } from "../schema/type-key"
import { scalarConverters } from "./scalars"

export const DEFAULT_SEPARATOR = ","

/**
 * Splits `raw` on `separator` and converts every element.
 *
 * Empty substrings are kept: `"a,,b"` has three elements. The first element
 * that fails to convert fails the whole sequence.
 */
export function convertList(element: TypeKey<unknown>, raw: string, separator = ""): unknown[] {
  const shape = element.shape
  const parts = raw.split(separator || DEFAULT_SEPARATOR)

  switch (shape.kind) {
    case "scalar": {
      const convert = scalarConverters[shape.scalar]
      return parts.map((part) => convert(part))
    }
    case "text":
      return parts.map((part) => decodeText(shape.create(), part, element.id))
    default:
      throw new UnsupportedSliceTypeError(element.id)
  }
}

/** A decoder rejecting `raw` is an ordinary conversion failure. */
export function decodeText<T extends TextUnmarshaler>(target: T, raw: string, typeId: string): T {
  try {
    target.unmarshalText(raw)
  } catch (err) {
    throw toAppError(err, { code: "conversion_failed", isOperational: true, context: { typeId } })
  }

  return target
}
