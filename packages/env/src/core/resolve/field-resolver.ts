import type { AppError } from "@envbind/errors"
import type { EnvStore } from "../../ports/env-store"
import { RequiredNotSetError, UnrecognizedOptionError } from "../errors"
import type { FieldDescriptor } from "../schema/descriptor"
import { expandVariables } from "./expand"

export type Resolution =
  | { readonly kind: "value"; readonly key: string; readonly raw: string }
  | { readonly kind: "empty"; readonly key: string }
  | { readonly kind: "error"; readonly key: string; readonly error: AppError }

const REQUIRED = "required"

/**
 * Resolves the raw string for one field.
 *
 * The variable at `prefix + key` wins, then the default literal, then "";
 * expansion applies to that value. A required field ignores its default and
 * is never expanded; it must be present (empty counts as present). An empty
 * result means "leave the field as it is".
 */
export function resolveField(
  descriptor: FieldDescriptor<unknown>,
  store: EnvStore,
  prefix = "",
): Resolution {
  const key = prefix + descriptor.key

  const unknownOption = descriptor.options.find((opt) => opt !== "" && opt !== REQUIRED)
  if (unknownOption !== undefined) {
    return { kind: "error", key, error: new UnrecognizedOptionError(unknownOption, descriptor.key) }
  }

  const value = store.read(key)
  const required = descriptor.options.includes(REQUIRED)

  if (required && value === undefined) {
    return { kind: "error", key, error: new RequiredNotSetError(descriptor.key, key) }
  }

  const raw = required ? (value ?? "") : optionalValue(descriptor, value, store)

  return raw === "" ? { kind: "empty", key } : { kind: "value", key, raw }
}

function optionalValue(
  descriptor: FieldDescriptor<unknown>,
  value: string | undefined,
  store: EnvStore,
): string {
  const raw = value ?? descriptor.defaultValue ?? ""

  return descriptor.expand ? expandVariables(raw, (name) => store.read(name)) : raw
}
