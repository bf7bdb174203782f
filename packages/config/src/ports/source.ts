/**
 * A source of raw configuration values: the environment, a dotenv file, a
 * JSON config file, or values set from command-line flags.
 *
 * Sources only load. Validation, coercion and merging happen in
 * `loadConfig`, where later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Name used in provenance, e.g. "env", "dotenv:.env", "json:plugin.json".
   */
  readonly name: string

  /**
   * Returns a fresh object on every call. An `undefined` value means the key
   * was not provided.
   */
  load(): Promise<Record<string, unknown>>
}
