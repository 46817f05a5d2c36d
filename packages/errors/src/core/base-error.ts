import type { AppError, ErrorCode, ErrorContext, SerializedError } from "../ports/error"

export type BaseErrorOptions<C extends ErrorCode = ErrorCode> = Readonly<{
  code: C
  context?: ErrorContext
  cause?: unknown
  isOperational?: boolean
}>

export class BaseError<C extends ErrorCode = ErrorCode> extends Error implements AppError {
  readonly code: C
  readonly context: ErrorContext
  readonly isOperational: boolean
  readonly timestamp: Date

  constructor(message: string, options: BaseErrorOptions<C>) {
    super(message, { cause: options.cause })

    this.name = this.constructor.name
    this.code = options.code
    this.context = Object.freeze({ ...options.context })
    this.isOperational = options.isOperational ?? true
    this.timestamp = new Date()

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  toJSON(): SerializedError {
    return serializeError(this)
  }
}

/**
 * Options for error serialization.
 */
export type SerializeOptions = Readonly<{
  /** Include stack traces in output. Default: false */
  includeStack?: boolean
}>

function nestedErrors(err: Error): unknown[] | undefined {
  const errors: unknown = Reflect.get(err, "errors")

  return Array.isArray(errors) ? errors : undefined
}

/**
 * Serialize any error (or thrown value) to a consistent shape.
 *
 * Handles:
 * - BaseError instances (preserves code, context, etc.)
 * - Standard Error instances (code defaults to "unknown")
 * - Aggregates exposing an `errors` array (each entry serialized in order)
 * - Non-Error thrown values (wrapped with context)
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  const includeStack = options?.includeStack ?? false

  if (err instanceof Error) {
    const isBase = err instanceof BaseError
    const errors = nestedErrors(err)

    return {
      name: err.name,
      code: isBase ? err.code : "unknown",
      message: err.message,
      context: isBase ? { ...err.context } : {},
      isOperational: isBase ? err.isOperational : false,
      timestamp: (isBase ? err.timestamp : new Date()).toISOString(),
      ...(err.cause !== undefined && { cause: serializeError(err.cause, options) }),
      ...(errors && { errors: errors.map((e) => serializeError(e, options)) }),
      ...(includeStack && err.stack && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: { value: err },
    isOperational: false,
    timestamp: new Date().toISOString(),
  }
}
