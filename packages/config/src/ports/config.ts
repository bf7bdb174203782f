/**
 * Validated configuration with provenance for each key.
 *
 * @typeParam T - The shape of the configuration, usually inferred from a Zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     LOG_LEVEL: levelSchema.default(Levels.Info),
 *     PLUGIN_TIMEOUT_MS: z.coerce.number().default(5000),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("LOG_LEVEL")      // -4
 * config.explain("LOG_LEVEL")  // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for a key, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of every source that provided at least one value, plus `"default"`. */
  sourcesUsed(): string[]

  /**
   * Keys present in the sources but not in the schema. Usually a typo in a
   * flag or environment variable name.
   */
  extras(): string[]
}
