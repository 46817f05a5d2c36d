import { z } from "zod"
import { InvalidFieldTagError } from "../errors"
import type { FieldDescriptor, NestedDescriptor, RecordSchema, SchemaShape } from "./descriptor"
import { type TypeKey, Types } from "./type-key"

const FieldTagSchema = z.strictObject({
  /** `"KEY"` or `"KEY,required"` */
  env: z.string().optional(),
  /** Literal used when the variable is unset; ignored for required fields */
  default: z.string().optional(),
  /** `true` or `"true"` (any case) enables `$VAR` / `${VAR}` expansion */
  expand: z.union([z.boolean(), z.string()]).optional(),
  /** Sequence separator; "" or absent means "," */
  separator: z.string().optional(),
})

export type FieldTag = z.infer<typeof FieldTagSchema>

function describe<T>(type: TypeKey<T>, tag: FieldTag = {}): FieldDescriptor<T> {
  const parsed = FieldTagSchema.safeParse(tag)
  if (!parsed.success) throw new InvalidFieldTagError(z.prettifyError(parsed.error))

  const { env = "", default: defaultValue, expand, separator = "" } = parsed.data
  const [key = "", ...options] = env.split(",")

  const descriptor: FieldDescriptor<T> = {
    kind: "field",
    type,
    key,
    options: Object.freeze(options),
    defaultValue,
    expand: expand === true || (typeof expand === "string" && expand.toLowerCase() === "true"),
    separator,
  }

  return Object.freeze(descriptor)
}

/**
 * Field descriptor builders.
 *
 * @throws InvalidFieldTagError when a tag has unknown keys or wrongly typed values
 */
export const field = {
  string: (tag?: FieldTag) => describe(Types.string, tag),
  bool: (tag?: FieldTag) => describe(Types.bool, tag),
  int: (tag?: FieldTag) => describe(Types.int, tag),
  int64: (tag?: FieldTag) => describe(Types.int64, tag),
  uint: (tag?: FieldTag) => describe(Types.uint, tag),
  uint64: (tag?: FieldTag) => describe(Types.uint64, tag),
  float32: (tag?: FieldTag) => describe(Types.float32, tag),
  float64: (tag?: FieldTag) => describe(Types.float64, tag),
  duration: (tag?: FieldTag) => describe(Types.duration, tag),
  url: (tag?: FieldTag) => describe(Types.url, tag),

  list: <T>(element: TypeKey<T>, tag?: FieldTag) => describe(Types.listOf(element), tag),

  /** A field of any type key: text types, custom types, or a prebuilt list key. */
  of: <T>(type: TypeKey<T>, tag?: FieldTag) => describe(type, tag),

  nested: <S extends SchemaShape>(schema: RecordSchema<S>): NestedDescriptor<S> => {
    const descriptor: NestedDescriptor<S> = { kind: "nested", schema }
    return Object.freeze(descriptor)
  },
} as const
