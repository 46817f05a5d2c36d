import type { Logger } from "@envbind/logger"
import type { OnFieldSet } from "../populate/populate"

export type FieldSetLoggerOptions = {
  /** Log the raw value too. Off by default: values are often secrets. */
  revealValues?: boolean
}

/**
 * Builds an `onFieldSet` hook that logs every populated field at `debug`.
 *
 * @example
 * ```ts
 * parse(schema, config, { onFieldSet: createFieldSetLogger(logger) })
 * ```
 */
export function createFieldSetLogger(logger: Logger, opts: FieldSetLoggerOptions = {}): OnFieldSet {
  return (field, raw) => {
    logger.debug("environment field set", {
      field: field.name,
      key: field.key,
      fieldType: field.typeId,
      ...(opts.revealValues && { value: raw }),
    })
  }
}
