import type { TypeKey } from "./type-key"

/** How one field is read from the environment. */
export interface FieldDescriptor<T> {
  readonly kind: "field"
  readonly type: TypeKey<T>
  /** Environment key without prefix. May be empty. */
  readonly key: string
  /** Tag options after the key, e.g. `["required"]` for `"TOKEN,required"`. */
  readonly options: readonly string[]
  readonly defaultValue: string | undefined
  readonly expand: boolean
  readonly separator: string
}

/** A field holding a sub-record populated with the same prefix and converters. */
export interface NestedDescriptor<S extends SchemaShape> {
  readonly kind: "nested"
  readonly schema: RecordSchema<S>
}

export type Descriptor = FieldDescriptor<unknown> | NestedDescriptor<SchemaShape>

export type SchemaShape = { readonly [name: string]: Descriptor }

export interface RecordSchema<S extends SchemaShape> {
  readonly shape: S
  /** Field names and descriptors in declaration order. */
  readonly entries: ReadonlyArray<readonly [name: string, descriptor: Descriptor]>
}

/**
 * The record type a schema populates.
 *
 * @example
 * ```ts
 * const schema = defineSchema({ port: field.int({ env: "PORT" }) })
 * type Config = InferRecord<typeof schema> // { port: number }
 * ```
 */
export type InferRecord<R> =
  R extends RecordSchema<infer S extends SchemaShape> ? InferShape<S> : never

type InferShape<S extends SchemaShape> = {
  -readonly [K in keyof S]: S[K] extends FieldDescriptor<infer T>
    ? T
    : S[K] extends NestedDescriptor<infer N extends SchemaShape>
      ? InferShape<N> | null
      : never
}

/** Target accepted by the parse entry points for a schema. */
export type RecordTarget<S extends SchemaShape> = Partial<InferShape<S>>
