/**
 * Supplies raw, unvalidated settings.
 *
 * Sources only load; coercion and validation happen once, against the schema,
 * after all sources are merged. Later sources override earlier ones.
 */
export interface SettingsSource {
  /** Provenance label, e.g. `env`, `dotenv:.env.production`. */
  readonly name: string

  /**
   * Returns a fresh object on every call. A key mapped to `undefined` counts as
   * not provided.
   */
  load(): Promise<Record<string, unknown>>
}
