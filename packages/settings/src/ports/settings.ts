/**
 * Validated process settings plus a record of where each value came from.
 *
 * @example
 * ```ts
 * const settings = await loadSettings({
 *   schema: z.object({ FLAGS_REFRESH_INTERVAL_MS: z.coerce.number().default(60_000) }),
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource()],
 * })
 *
 * settings.value.FLAGS_REFRESH_INTERVAL_MS // 60000
 * settings.explain("FLAGS_REFRESH_INTERVAL_MS") // "default"
 * ```
 */
export interface ISettings<T extends Record<string, unknown>> {
  readonly value: T

  /** Name of the source that supplied `key`, or `"default"` for schema defaults. */
  explain<K extends keyof T & string>(key: K): string

  /** Distinct source names that supplied at least one value. */
  sourcesUsed(): string[]

  /** Keys some source provided that the schema does not know. */
  unknownKeys(): string[]
}
