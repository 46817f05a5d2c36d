import { CustomConverterError, UnsupportedTypeError } from "../errors"
import { isTextUnmarshaler, type TypeKey } from "../schema/type-key"
import { CustomConverters } from "./converters"
import { scalarConverters } from "./scalars"
import { convertList, decodeText } from "./sequence"

export type ConvertOptions = {
  /** Separator for sequence types. Empty or absent means ",". */
  separator?: string
  /** The field's value before conversion; text types decode into it when they can. */
  current?: unknown
}

/**
 * Resolves the conversion for a type key: caller-supplied converters first,
 * then the built-in scalar, text and sequence conversions.
 */
export class ConverterRegistry {
  constructor(private readonly custom: CustomConverters = new CustomConverters()) {}

  /** @throws AppError when `raw` cannot be converted to `type` */
  convert(type: TypeKey<unknown>, raw: string, options: ConvertOptions = {}): unknown {
    const custom = this.custom.get(type.id)
    if (custom) {
      try {
        return custom(raw)
      } catch (err) {
        throw new CustomConverterError(type.id, err)
      }
    }

    const shape = type.shape

    switch (shape.kind) {
      case "scalar":
        return scalarConverters[shape.scalar](raw)
      case "text":
        return decodeText(
          isTextUnmarshaler(options.current) ? options.current : shape.create(),
          raw,
          type.id,
        )
      case "list":
        return convertList(shape.element, raw, options.separator)
      case "opaque":
        throw new UnsupportedTypeError(type.id)
    }
  }
}
