/**
 * Validated configuration with provenance.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ REDIS_URL: z.string(), HASH_SCAN_COUNT: z.coerce.number() }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.get("HASH_SCAN_COUNT") // 100
 * config.explain("REDIS_URL")   // "env"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Name of the source that supplied the final value of `key`, or `default`
   * when the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct provenance labels, in first-use order. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know. */
  unknownKeys(): string[]
}
