/**
 * Validated configuration with provenance.
 *
 * @typeParam T - The shape of the configuration object, typically inferred from a zod schema.
 *
 * @example
 * ```typescript
 * const config = await loadConfig({
 *   schema: z.object({
 *     SMTP_USER: z.string(),
 *     LOG_LEVEL: z.enum(["info", "debug"]).default("info"),
 *   }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * config.value.SMTP_USER       // "sender@example.com"
 * config.explain("SMTP_USER")  // "dotenv:.env"
 * config.explain("LOG_LEVEL")  // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  /** Full validated config object */
  readonly value: T

  /**
   * Source name that provided the final value for a key, or "default" when
   * the schema filled it in.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that supplied at least one value; schema defaults are not a source. */
  sourcesUsed(): string[]
}
