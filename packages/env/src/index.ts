export { MemoryEnvStore, type MemoryEnvStoreOptions } from "./adapters/memory/memory-env-store"
export { ProcessEnvStore } from "./adapters/process/process-env-store"
export { Env, type EnvWriteResult, env, type RequiredLookup } from "./core/accessor/env"
export { type Converter, CustomConverters } from "./core/convert/converters"
export { parseDuration } from "./core/convert/duration"
export { type ConvertOptions, ConverterRegistry } from "./core/convert/registry"
export { DEFAULT_SEPARATOR } from "./core/convert/sequence"
export { UriReference } from "./core/convert/uri-reference"
export {
  ConversionError,
  CustomConverterError,
  type EnvErrorCode,
  EnvNotSetError,
  EnvParseError,
  FieldAssignError,
  InvalidEnvEntryError,
  InvalidFieldTagError,
  NotAStructPtrError,
  RequiredNotSetError,
  UnrecognizedOptionError,
  UnsupportedSliceTypeError,
  UnsupportedTypeError,
} from "./core/errors"
export { createFieldSetLogger, type FieldSetLoggerOptions } from "./core/hooks/log-field-set"
export {
  type ParseOptions,
  type ParseResult,
  parse,
  parseWithFuncs,
  parseWithPrefix,
  parseWithPrefixFuncs,
  tryParse,
} from "./core/parse"
export type { FieldInfo, OnFieldSet } from "./core/populate/populate"
export { expandVariables } from "./core/resolve/expand"
export { defineSchema } from "./core/schema/define-schema"
export type {
  Descriptor,
  FieldDescriptor,
  InferRecord,
  NestedDescriptor,
  RecordSchema,
  RecordTarget,
  SchemaShape,
} from "./core/schema/descriptor"
export { type FieldTag, field } from "./core/schema/field"
export {
  type Milliseconds,
  type ScalarKind,
  type ScalarValue,
  type TextUnmarshaler,
  type TypeShape,
  TypeKey,
  Types,
} from "./core/schema/type-key"
export type { EnvStore } from "./ports/env-store"
