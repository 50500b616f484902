import type { AppError } from "@tessera/errors"
import type { Configuration, ConfigurationAlias } from "./configuration"

/** One immutable, internally consistent view of every configuration. */
export interface ConfigurationSnapshot {
  /** Increases by one with every successful load. */
  readonly version: number
  readonly loadedAt: Date
  readonly size: number

  get(alias: ConfigurationAlias): Configuration | undefined
  has(alias: ConfigurationAlias): boolean
  aliases(): readonly ConfigurationAlias[]
  configurations(): readonly Configuration[]
}

export interface ConfigurationLookup {
  get(alias: ConfigurationAlias): Configuration | undefined
}

export type RepositoryState = "ready" | "refreshing"

export interface RepositoryStatus {
  state: RepositoryState

  /** `true` while the most recent refresh failed and an older snapshot is served. */
  stale: boolean
  consecutiveFailures: number
  version: number
  lastSuccessAt: Date
  lastFailureAt?: Date
}

export type RefreshOutcome =
  | { kind: "refreshed"; snapshot: ConfigurationSnapshot }
  | { kind: "failed"; error: AppError; snapshot: ConfigurationSnapshot }

export interface ConfigurationRepository extends ConfigurationLookup {
  /** Always throws: the store only mirrors its remote source. */
  put(alias: ConfigurationAlias, value: unknown): never

  snapshot(): ConfigurationSnapshot
  status(): RepositoryStatus

  /** Runs one load-parse-publish cycle now, joining one already in flight. */
  refresh(): Promise<RefreshOutcome>
}
