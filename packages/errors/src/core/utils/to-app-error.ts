import type { AppError, ErrorCode, ErrorContext } from "../../ports/error"
import { BaseError } from "../base-error"

export type ToAppErrorOptions = Readonly<{
  /** Code for values that are not already a BaseError. Default: "unknown" */
  code?: ErrorCode
  /**
   * Whether the wrapped failure is expected at runtime. A user decoder
   * rejecting a malformed literal is; a store that throws is not.
   *
   * @default false
   */
  isOperational?: boolean
  /** Merged into the wrapped error's context */
  context?: ErrorContext
}>

/**
 * Normalizes a thrown value.
 *
 * A BaseError passes through unchanged. An Error keeps its message and becomes
 * the cause. Anything else is described in `context.value`.
 */
export function toAppError(err: unknown, options: ToAppErrorOptions = {}): AppError {
  if (err instanceof BaseError) return err

  const { code = "unknown", isOperational = false, context = {} } = options

  if (err instanceof Error) {
    return new BaseError(err.message, { code, context, cause: err, isOperational })
  }

  if (typeof err === "string") {
    return new BaseError(err, { code, context, isOperational })
  }

  return new BaseError("Unknown error", {
    code,
    context: { ...context, value: err },
    isOperational,
  })
}
