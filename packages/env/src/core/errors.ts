import { BaseError, type ErrorContext } from "@envbind/errors"

export type EnvErrorCode =
  | "not_a_struct_ptr"
  | "unsupported_type"
  | "unsupported_slice_type"
  | "required_not_set"
  | "unrecognized_option"
  | "conversion_failed"
  | "custom_converter_failed"
  | "field_assign_failed"
  | "env_parse_failed"
  | "env_not_set"
  | "invalid_env_entry"
  | "invalid_field_tag"
  | "env_write_failed"

/** Thrown before any field is visited when the target is not a mutable record object. */
export class NotAStructPtrError extends BaseError<"not_a_struct_ptr"> {
  constructor(received: unknown) {
    super("Expected a mutable record object", {
      code: "not_a_struct_ptr",
      context: { received: describeValue(received) },
      isOperational: false,
    })
  }
}

export class UnsupportedTypeError extends BaseError<"unsupported_type"> {
  constructor(typeId: string) {
    super("Type is not supported", { code: "unsupported_type", context: { typeId } })
  }
}

export class UnsupportedSliceTypeError extends BaseError<"unsupported_slice_type"> {
  constructor(typeId: string) {
    super("Unsupported slice type", { code: "unsupported_slice_type", context: { typeId } })
  }
}

export class RequiredNotSetError extends BaseError<"required_not_set"> {
  constructor(key: string, effectiveKey: string) {
    super(`required environment variable "${key}" is not set`, {
      code: "required_not_set",
      context: { key, effectiveKey },
    })
  }
}

export class UnrecognizedOptionError extends BaseError<"unrecognized_option"> {
  constructor(option: string, key: string) {
    super(`env tag option "${option}" not supported`, {
      code: "unrecognized_option",
      context: { option, key },
    })
  }
}

/** A literal that does not denote a value of the target scalar type. */
export class ConversionError extends BaseError<"conversion_failed"> {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, { code: "conversion_failed", context })
  }
}

export class CustomConverterError extends BaseError<"custom_converter_failed"> {
  constructor(typeId: string, cause: unknown) {
    super(`Custom parser error: ${causeMessage(cause)}`, {
      code: "custom_converter_failed",
      context: { typeId },
      cause,
    })
  }
}

export class FieldAssignError extends BaseError<"field_assign_failed"> {
  constructor(field: string) {
    super(`field "${field}" is read-only`, {
      code: "field_assign_failed",
      context: { field },
    })
  }
}

/**
 * One failed parse. `errors` holds every per-field failure in declaration
 * order; the message joins theirs with ". ".
 */
export class EnvParseError extends BaseError<"env_parse_failed"> {
  readonly errors: readonly Error[]

  constructor(errors: readonly Error[]) {
    super(errors.map((e) => e.message).join(". "), {
      code: "env_parse_failed",
      context: { errorCount: errors.length },
    })
    this.errors = Object.freeze([...errors])
  }
}

export class EnvNotSetError extends BaseError<"env_not_set"> {
  constructor(key: string) {
    super(`expected environment variable "${key}" does not exist`, {
      code: "env_not_set",
      context: { key },
    })
  }
}

export class InvalidEnvEntryError extends BaseError<"invalid_env_entry"> {
  constructor(reason: string, key: string) {
    super(`invalid environment entry ${JSON.stringify(key)}: ${reason}`, {
      code: "invalid_env_entry",
      context: { key, reason },
    })
  }
}

export class InvalidFieldTagError extends BaseError<"invalid_field_tag"> {
  constructor(details: string) {
    super(`Invalid field tag:\n${details}`, { code: "invalid_field_tag", isOperational: false })
  }
}

function causeMessage(cause: unknown): string {
  if (cause instanceof Error) return cause.message
  return typeof cause === "string" ? cause : String(cause)
}

function describeValue(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (typeof value === "object" && Object.isFrozen(value)) return "frozen object"
  return typeof value
}
