import type { LogContext, LogContextPatch } from "../../ports/log-context"
import type { Logger } from "../../ports/logger"

/**
 * Discards every entry. Parse calls log through one unless the caller passes
 * a logger, so library users see nothing by default.
 */
export class NullLogger<TContext extends LogContext = LogContext> implements Logger<TContext> {
  trace(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  fatal(): void {}

  child<U extends LogContextPatch>(): Logger<TContext & U> {
    return new NullLogger<TContext & U>()
  }
}

export function createNullLogger<TContext extends LogContext = LogContext>(): Logger<TContext> {
  return new NullLogger<TContext>()
}
