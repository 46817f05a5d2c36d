import { type AppError, toAppError } from "@envbind/errors"
import { ProcessEnvStore } from "../../adapters/process/process-env-store"
import type { EnvStore } from "../../ports/env-store"
import { type EnvErrorCode, EnvNotSetError, InvalidEnvEntryError } from "../errors"

export type RequiredLookup =
  | { readonly ok: true; readonly value: string }
  | { readonly ok: false; readonly error: EnvNotSetError }

export type EnvWriteResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: AppError }

/**
 * Accessor for single environment variables.
 *
 * Every call reads the store at call time; nothing is cached.
 *
 * @example
 * ```ts
 * const port = env.getOr("PORT", "8080")
 * const token = env.mustGet("API_TOKEN") // throws when unset
 * ```
 */
export class Env {
  constructor(readonly store: EnvStore = new ProcessEnvStore()) {}

  get(key: string): string | undefined {
    return this.store.read(key)
  }

  getOr(key: string, fallback: string): string {
    return this.store.read(key) ?? fallback
  }

  /** An explicitly empty value satisfies the lookup. */
  getRequired(key: string): RequiredLookup {
    const value = this.store.read(key)

    if (value === undefined) return { ok: false, error: new EnvNotSetError(key) }

    return { ok: true, value }
  }

  /**
   * Like `getRequired` but throws. Meant for startup code where a missing
   * variable should stop the process.
   *
   * @throws EnvNotSetError
   */
  mustGet(key: string): string {
    const lookup = this.getRequired(key)

    if (!lookup.ok) throw lookup.error

    return lookup.value
  }

  set(key: string, value: string): EnvWriteResult {
    const invalid = validateEntry(key, value)
    if (invalid) return { ok: false, error: invalid }

    return this.attempt(key, () => this.store.write(key, value))
  }

  unset(key: string): EnvWriteResult {
    const invalid = validateEntry(key, "")
    if (invalid) return { ok: false, error: invalid }

    return this.attempt(key, () => this.store.delete(key))
  }

  private attempt(key: string, op: () => void): EnvWriteResult {
    try {
      op()
      return { ok: true }
    } catch (err) {
      const code: EnvErrorCode = "env_write_failed"
      return { ok: false, error: toAppError(err, { code, context: { key, store: this.store.name } }) }
    }
  }
}

function validateEntry(key: string, value: string): InvalidEnvEntryError | null {
  if (key.length === 0) return new InvalidEnvEntryError("key is empty", key)
  if (key.includes("=")) return new InvalidEnvEntryError("key contains '='", key)
  if (key.includes("\0")) return new InvalidEnvEntryError("key contains NUL", key)
  if (value.includes("\0")) return new InvalidEnvEntryError("value contains NUL", key)

  return null
}

/** Accessor over the live process environment. */
export const env = new Env()
