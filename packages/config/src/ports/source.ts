/**
 * Supplies raw configuration values.
 *
 * Sources only load. Validation, coercion and merging happen in `loadConfig`,
 * where later sources override earlier ones.
 */
export interface ConfigSource {
  /** Provenance label, e.g. `env`, `dotenv:.env.local`. */
  readonly name: string

  /**
   * Returns flat key/value pairs. A key mapped to `undefined` counts as not
   * provided.
   */
  load(): Promise<Record<string, unknown>>
}
