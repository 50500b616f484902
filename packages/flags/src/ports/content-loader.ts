/**
 * Fetches the raw configuration payload.
 *
 * Implementations re-fetch on every call; transport, authentication and
 * decryption are their concern.
 */
export interface ContentLoader {
  /** Human-readable source, e.g. `s3://bucket/flags.json`. */
  readonly location: string

  loadContent(): Promise<string>
}
