import type { AppError } from "@envbind/errors"
import { createNullLogger, type Logger } from "@envbind/logger"
import { ProcessEnvStore } from "../adapters/process/process-env-store"
import type { EnvStore } from "../ports/env-store"
import type { CustomConverters } from "./convert/converters"
import { ConverterRegistry } from "./convert/registry"
import { type OnFieldSet, populate } from "./populate/populate"
import type { RecordSchema, RecordTarget, SchemaShape } from "./schema/descriptor"

export type ParseOptions = {
  /** Prepended to every declared key, nested records included. */
  prefix?: string
  /** Caller-supplied converters; they shadow built-ins for the same type id. */
  converters?: CustomConverters
  /** Where variables are read. Default: the live process environment. */
  store?: EnvStore
  onFieldSet?: OnFieldSet
  /** Default: a logger that discards everything. */
  logger?: Logger
}

export type ParseResult = { readonly success: true } | { readonly success: false; readonly error: AppError }

/**
 * Populates `target` without throwing.
 *
 * @example
 * ```ts
 * const result = tryParse(schema, config, { prefix: "APP_" })
 * if (!result.success) logger.error("invalid configuration", { err: result.error })
 * ```
 */
export function tryParse<S extends SchemaShape>(
  schema: RecordSchema<S>,
  target: RecordTarget<S>,
  options: ParseOptions = {},
): ParseResult {
  const prefix = options.prefix ?? ""
  const logger = (options.logger ?? createNullLogger()).child({ module: "envbind", prefix })

  const result = populate(schema, target, {
    registry: new ConverterRegistry(options.converters),
    store: options.store ?? new ProcessEnvStore(),
    prefix,
    logger,
    onFieldSet: options.onFieldSet,
  })

  if (!result.success) {
    logger.debug("environment parse failed", {
      errorCount: errorCountOf(result.error),
      err: result.error,
    })
    return { success: false, error: result.error }
  }

  logger.debug("environment parsed", { fieldCount: result.fieldCount, errorCount: 0 })
  return { success: true }
}

/**
 * Populates `target` from the environment.
 *
 * @throws NotAStructPtrError when `target` is not a mutable record object
 * @throws EnvParseError with every field failure, in declaration order
 */
export function parse<S extends SchemaShape>(
  schema: RecordSchema<S>,
  target: RecordTarget<S>,
  options: ParseOptions = {},
): void {
  const result = tryParse(schema, target, options)
  if (!result.success) throw result.error
}

/** `parse` with every key read as `prefix + key`. */
export function parseWithPrefix<S extends SchemaShape>(
  schema: RecordSchema<S>,
  target: RecordTarget<S>,
  prefix: string,
  options: Omit<ParseOptions, "prefix"> = {},
): void {
  parse(schema, target, { ...options, prefix })
}

/** `parse` with caller-supplied converters. */
export function parseWithFuncs<S extends SchemaShape>(
  schema: RecordSchema<S>,
  target: RecordTarget<S>,
  converters: CustomConverters,
  options: Omit<ParseOptions, "converters"> = {},
): void {
  parse(schema, target, { ...options, converters })
}

export function parseWithPrefixFuncs<S extends SchemaShape>(
  schema: RecordSchema<S>,
  target: RecordTarget<S>,
  prefix: string,
  converters: CustomConverters,
  options: Omit<ParseOptions, "prefix" | "converters"> = {},
): void {
  parse(schema, target, { ...options, prefix, converters })
}

function errorCountOf(error: AppError): number {
  const count = error.context.errorCount
  return typeof count === "number" ? count : 1
}
