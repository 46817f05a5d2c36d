import type { EnvStore } from "../../ports/env-store"

/**
 * EnvStore over the live `process.env` table.
 */
export class ProcessEnvStore implements EnvStore {
  readonly name = "process"

  read(key: string): string | undefined {
    return Object.hasOwn(process.env, key) ? process.env[key] : undefined
  }

  write(key: string, value: string): void {
    process.env[key] = value
  }

  delete(key: string): void {
    delete process.env[key]
  }
}
