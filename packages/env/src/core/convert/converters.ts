import type { TypeKey } from "../schema/type-key"

/** Produces a typed value from one raw environment string; throws on failure. */
export type Converter<T> = (raw: string) => T

/**
 * Caller-supplied converters, keyed by type id.
 *
 * A converter registered for a type id takes precedence over the built-in
 * conversion for that exact id. Instances are passed per parse call; nothing
 * is registered globally.
 *
 * @example
 * ```ts
 * const converters = new CustomConverters()
 *   .set(Types.custom<Color>("Color"), (raw) => Color.fromHex(raw))
 *   .set(Types.duration, (raw) => Number(raw) * 1000)
 * ```
 */
export class CustomConverters {
  private readonly byId = new Map<string, Converter<unknown>>()

  /** Registers `convert` for `type`, replacing any converter already set for its id. */
  set<T>(type: TypeKey<T>, convert: Converter<T>): this {
    this.byId.set(type.id, convert)
    return this
  }

  get(typeId: string): Converter<unknown> | undefined {
    return this.byId.get(typeId)
  }

  has(typeId: string): boolean {
    return this.byId.has(typeId)
  }

  get size(): number {
    return this.byId.size
  }
}
