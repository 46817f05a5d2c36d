export type LogContext = {
  service: string
  module: string

  /** Record field name as declared in the schema */
  field: string
  /** Effective environment key (prefix included) */
  key: string
  prefix: string
  fieldType: string
  /** Raw environment value. Logged only when explicitly requested. */
  value: string

  fieldCount: number
  errorCount: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context.
 * Used by child() to add or override context fields.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
