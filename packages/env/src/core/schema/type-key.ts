import type { UriReference } from "../convert/uri-reference"

/** Durations are carried as (possibly fractional) milliseconds. */
export type Milliseconds = number

export type ScalarKind =
  | "string"
  | "bool"
  | "int"
  | "int64"
  | "uint"
  | "uint64"
  | "float32"
  | "float64"
  | "duration"
  | "url"

export type ScalarValue = {
  string: string
  bool: boolean
  int: number
  int64: bigint
  uint: number
  uint64: bigint
  float32: number
  float64: number
  duration: Milliseconds
  url: UriReference
}

/**
 * A type that can decode itself from text, in place.
 *
 * @example
 * ```ts
 * class LogLevel implements TextUnmarshaler {
 *   value: "debug" | "info" = "info"
 *
 *   unmarshalText(text: string) {
 *     if (text !== "debug" && text !== "info") throw new Error(`unknown level ${text}`)
 *     this.value = text
 *   }
 * }
 * ```
 */
export interface TextUnmarshaler {
  unmarshalText(text: string): void
}

export type TypeShape =
  | { readonly kind: "scalar"; readonly scalar: ScalarKind }
  | { readonly kind: "text"; readonly create: () => TextUnmarshaler }
  | { readonly kind: "list"; readonly element: TypeKey<unknown> }
  | { readonly kind: "opaque" }

/**
 * Stable identifier of a field's target type.
 *
 * Converters are registered and looked up by `id`, so two keys with the
 * same id are the same type as far as conversion is concerned.
 */
export class TypeKey<T> {
  /** Phantom: carries `T` for inference, never set at runtime. */
  declare readonly _value: T

  constructor(
    readonly id: string,
    readonly shape: TypeShape,
  ) {}

  toString(): string {
    return this.id
  }
}

function scalar<K extends ScalarKind>(kind: K): TypeKey<ScalarValue[K]> {
  return new TypeKey<ScalarValue[K]>(kind, { kind: "scalar", scalar: kind })
}

export const Types = {
  string: scalar("string"),
  bool: scalar("bool"),
  int: scalar("int"),
  int64: scalar("int64"),
  uint: scalar("uint"),
  uint64: scalar("uint64"),
  float32: scalar("float32"),
  float64: scalar("float64"),
  duration: scalar("duration"),
  url: scalar("url"),

  listOf<T>(element: TypeKey<T>): TypeKey<T[]> {
    return new TypeKey<T[]>(`${element.id}[]`, { kind: "list", element })
  },

  /** A user type decoded through its `unmarshalText` method. */
  text<T extends TextUnmarshaler>(id: string, create: () => T): TypeKey<T> {
    return new TypeKey<T>(id, { kind: "text", create })
  },

  /** A user type only a caller-supplied converter can produce. */
  custom<T>(id: string): TypeKey<T> {
    return new TypeKey<T>(id, { kind: "opaque" })
  },
} as const

export function isTextUnmarshaler(value: unknown): value is TextUnmarshaler {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "unmarshalText") === "function"
  )
}
