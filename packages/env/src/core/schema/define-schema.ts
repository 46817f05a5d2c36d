import type { Descriptor, RecordSchema, SchemaShape } from "./descriptor"

/**
 * Declares the fields of a configuration record, in order.
 *
 * Fields are visited in the order their names were declared. Integer-like
 * names ("0", "1") are ordered first by the language, so avoid them.
 *
 * @example
 * ```ts
 * const schema = defineSchema({
 *   host: field.string({ env: "HOST", default: "localhost" }),
 *   port: field.int({ env: "PORT,required" }),
 *   tags: field.list(Types.string, { env: "TAGS", separator: ";" }),
 * })
 * ```
 */
export function defineSchema<S extends SchemaShape>(shape: S): RecordSchema<S> {
  const base: SchemaShape = shape
  const entries: Array<readonly [string, Descriptor]> = Object.entries(base)
  const schema: RecordSchema<S> = { shape, entries: Object.freeze(entries) }

  return Object.freeze(schema)
}
