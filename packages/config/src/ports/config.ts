/**
 * Validated configuration with provenance.
 *
 * @typeParam T - shape of the configuration, usually inferred from a zod schema
 *
 * @example
 * ```typescript
 * const result = await loadConfig({
 *   schema: z.object({
 *     SPIFFE_ENDPOINT_SOCKET: z.string(),
 *     LOG_LEVEL: z.enum(logLevelNames).default("info"),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * if (result.ok) {
 *   result.value.get("SPIFFE_ENDPOINT_SOCKET") // "unix:///run/spire/agent.sock"
 *   result.value.explain("LOG_LEVEL")          // "default"
 * }
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: Readonly<T>

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that provided the final value for `key`, or
   * `"default"` when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of all sources that contributed at least one value, in order. */
  sourcesUsed(): string[]

  /**
   * Keys present in the sources but not in the schema. Usually typos or
   * stale settings.
   */
  unknownKeys(): string[]
}
