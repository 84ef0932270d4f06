/**
 * Loads raw configuration values from one place (a JSON file, a `.env` file,
 * the process environment). Sources neither validate nor merge; `loadConfig`
 * merges them in order, later wins, and the schema coerces and validates the
 * result.
 */
export interface ConfigSource {
  /** Provenance label, e.g. `"env"`, `"dotenv:.env"`, `"json:config.json"`. */
  readonly name: string

  /**
   * Env and dotenv sources return flat strings; JSON sources may return
   * nested sections such as `smtp` or `settings`. A key mapped to
   * `undefined` counts as not provided.
   */
  load(): Promise<Record<string, unknown>>
}
