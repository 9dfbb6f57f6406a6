/**
 * A source of raw configuration values.
 *
 * Sources only load; validation, coercion and merging happen in
 * `loadConfig`. Later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Name used in provenance, e.g. "env", "dotenv:.env".
   */
  readonly name: string

  /**
   * Load values. A key mapped to `undefined` counts as not provided.
   * Each call returns a fresh object.
   */
  load(): Promise<Record<string, unknown>>
}
