/**
 * Configuration container providing type-safe access to validated configuration values.
 *
 * @typeParam T - The shape of the configuration object, typically inferred from a Zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     CAPACITY: z.coerce.number().int().nonnegative().default(0),
 *     EVICTION_POLICY: z.enum(["lru", "mru", "lfu", "random"]).default("lru"),
 *   }),
 *   sources: [new EnvSource({ prefix: "CACHE_" })],
 * })
 *
 * config.get("CAPACITY")         // 500
 * config.explain("CAPACITY")     // "env"
 * config.explain("EVICTION_POLICY") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  /** Validated value for a single key. */
  get<K extends keyof T & string>(key: K): T[K]

  /** Keys of the validated config object. */
  keys(): (keyof T & string)[]

  /**
   * Explains which source provided the final value for a key.
   *
   * @returns The source name (e.g. "env", "object:overrides", "default" for Zod defaults).
   */
  explain<K extends keyof T & string>(key: K): string

  /**
   * Returns the names of all sources that contributed at least one value,
   * in the order they were applied.
   */
  sourcesUsed(): string[]

  /**
   * Returns keys present in sources but not defined in the schema.
   *
   * Useful for detecting typos or stale config.
   */
  unknownKeys(): string[]
}
