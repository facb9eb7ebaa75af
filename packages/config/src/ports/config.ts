/**
 * Validated configuration with provenance.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     REDIS_URL: z.string().default("redis://localhost:6379"),
 *     LOG_LEVEL: z.enum(logLevelNames).default("info"),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("REDIS_URL")      // "redis://cache.internal:6379"
 * config.explain("REDIS_URL")  // "env"
 * config.explain("LOG_LEVEL")  // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  /**
   * Name of the source that provided the final value for a key, or
   * `"default"` when the schema supplied it.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value. */
  sourcesUsed(): string[]

  /**
   * Keys present in sources but not defined in the schema (typos, stale
   * settings, or an unprefixed environment).
   */
  unknownKeys(): string[]
}
