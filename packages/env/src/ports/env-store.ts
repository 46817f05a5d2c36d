/**
 * A live key/value view of environment variables.
 *
 * Stores do no caching: every `read` reflects the table at call time, so a
 * `write` is visible to the next `read`.
 *
 * `read` returns `undefined` for an unset key and `""` for a key that is set
 * to the empty string. Callers rely on the difference for `required` fields.
 */
export interface EnvStore {
  /** Human-readable name for debugging. Example: "process", "memory" */
  readonly name: string

  read(key: string): string | undefined

  write(key: string, value: string): void

  delete(key: string): void
}
