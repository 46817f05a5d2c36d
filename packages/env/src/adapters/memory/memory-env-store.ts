import type { EnvStore } from "../../ports/env-store"

export type MemoryEnvStoreOptions = {
  /**
   * Initial variables. Copied, so the caller's object is never mutated.
   * Entries whose value is `undefined` count as unset.
   */
  env?: Record<string, string | undefined>
}

export class MemoryEnvStore implements EnvStore {
  readonly name = "memory"
  private readonly vars = new Map<string, string>()

  constructor(options: MemoryEnvStoreOptions = {}) {
    for (const [key, value] of Object.entries(options.env ?? {})) {
      if (value !== undefined) this.vars.set(key, value)
    }
  }

  read(key: string): string | undefined {
    return this.vars.get(key)
  }

  write(key: string, value: string): void {
    this.vars.set(key, value)
  }

  delete(key: string): void {
    this.vars.delete(key)
  }

  /** Copy of the current table. */
  entries(): Record<string, string> {
    return Object.fromEntries(this.vars)
  }
}
