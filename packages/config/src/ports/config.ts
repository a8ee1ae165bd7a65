/**
 * Configuration container providing type-safe access to validated values.
 *
 * @typeParam T - Shape of the configuration, typically inferred from a Zod schema.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ CACHE_LIFETIME: z.coerce.number().default(86400) }),
 *   sources: [new EnvSource()],
 * })
 *
 * config.get("CACHE_LIFETIME")     // 86400
 * config.explain("CACHE_LIFETIME") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that provided the final value for `key`, or
   * "default" when the schema default was used.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value, deduplicated. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema.
   *
   * Useful for detecting typos and stale settings.
   */
  unknownKeys(): string[]
}
