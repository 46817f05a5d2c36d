import { type AppError, toAppError } from "@envbind/errors"
import type { Logger } from "@envbind/logger"
import type { EnvStore } from "../../ports/env-store"
import type { ConverterRegistry } from "../convert/registry"
import { EnvParseError, FieldAssignError, NotAStructPtrError } from "../errors"
import { resolveField } from "../resolve/field-resolver"
import type { FieldDescriptor, RecordSchema, SchemaShape } from "../schema/descriptor"

/** The field that was just populated. */
export type FieldInfo = {
  /** Property name on the record */
  readonly name: string
  /** Effective environment key, prefix included */
  readonly key: string
  readonly typeId: string
  /** Key, options, default, expansion flag and separator the value was read with */
  readonly descriptor: FieldDescriptor<unknown>
}

/** Called after each successful assignment with the raw string that produced the value. */
export type OnFieldSet = (field: FieldInfo, raw: string) => void

export type PopulateContext = {
  readonly registry: ConverterRegistry
  readonly store: EnvStore
  readonly prefix: string
  readonly logger: Logger
  readonly onFieldSet?: OnFieldSet
}

export type PopulateResult =
  | { readonly success: true; readonly fieldCount: number }
  | { readonly success: false; readonly error: AppError }

export function isMutableRecord(target: unknown): target is object {
  return (
    typeof target === "object" &&
    target !== null &&
    !Array.isArray(target) &&
    !Object.isFrozen(target)
  )
}

/**
 * Populates `target` from the environment, field by field in declaration order.
 *
 * Field failures are collected and reported together as one `EnvParseError`;
 * the remaining fields are still populated. Nested records are walked only
 * when they are mutable objects; a failure inside one is returned as is and
 * stops the walk.
 */
export function populate(
  schema: RecordSchema<SchemaShape>,
  target: unknown,
  ctx: PopulateContext,
): PopulateResult {
  if (!isMutableRecord(target)) {
    return { success: false, error: new NotAStructPtrError(target) }
  }

  const errors: AppError[] = []
  let fieldCount = 0

  for (const [name, descriptor] of schema.entries) {
    if (descriptor.kind === "nested") {
      const child: unknown = Reflect.get(target, name)
      if (!isMutableRecord(child)) continue

      const nested = populate(descriptor.schema, child, ctx)
      if (!nested.success) return nested

      fieldCount += nested.fieldCount
      continue
    }

    const error = populateField(target, name, descriptor, ctx)
    if (error === "skipped") continue
    if (error) {
      errors.push(error)
      continue
    }

    fieldCount++
  }

  if (errors.length > 0) return { success: false, error: new EnvParseError(errors) }

  return { success: true, fieldCount }
}

function populateField(
  target: object,
  name: string,
  descriptor: FieldDescriptor<unknown>,
  ctx: PopulateContext,
): AppError | "skipped" | undefined {
  const resolution = resolveField(descriptor, ctx.store, ctx.prefix)

  if (resolution.kind === "error") return resolution.error
  if (resolution.kind === "empty") return "skipped"

  const { key, raw } = resolution

  let value: unknown
  try {
    value = ctx.registry.convert(descriptor.type, raw, {
      separator: descriptor.separator,
      current: Reflect.get(target, name),
    })
  } catch (err) {
    return toAppError(err, {
      code: "conversion_failed",
      isOperational: true,
      context: { field: name, key, typeId: descriptor.type.id },
    })
  }

  if (!Reflect.set(target, name, value)) return new FieldAssignError(name)

  if (ctx.onFieldSet) {
    try {
      ctx.onFieldSet({ name, key, typeId: descriptor.type.id, descriptor }, raw)
    } catch (err) {
      ctx.logger.warn("onFieldSet hook failed", { field: name, key, err })
    }
  }

  return undefined
}
