import type { Configuration, ConfigurationAlias } from "../../ports/configuration"
import type { ConfigurationSnapshot } from "../../ports/configuration-repository"

export type SnapshotMetadata = {
  version: number
  loadedAt: Date
}

export class Snapshot implements ConfigurationSnapshot {
  readonly version: number
  private readonly loadedAtMs: number

  private constructor(
    private readonly byAlias: ReadonlyMap<ConfigurationAlias, Configuration>,
    metadata: SnapshotMetadata,
  ) {
    this.version = metadata.version
    this.loadedAtMs = metadata.loadedAt.getTime()
    Object.freeze(this)
  }

  /** Later configurations replace earlier ones with the same alias. */
  static fromConfigurations(
    configurations: readonly Configuration[],
    metadata: SnapshotMetadata,
  ): Snapshot {
    const byAlias = new Map<ConfigurationAlias, Configuration>()
    for (const configuration of configurations) {
      byAlias.set(configuration.alias, configuration)
    }

    return new Snapshot(byAlias, metadata)
  }

  /** A fresh `Date` on every read. */
  get loadedAt(): Date {
    return new Date(this.loadedAtMs)
  }

  get size(): number {
    return this.byAlias.size
  }

  get(alias: ConfigurationAlias): Configuration | undefined {
    return this.byAlias.get(alias)
  }

  has(alias: ConfigurationAlias): boolean {
    return this.byAlias.has(alias)
  }

  aliases(): readonly ConfigurationAlias[] {
    return [...this.byAlias.keys()]
  }

  configurations(): readonly Configuration[] {
    return [...this.byAlias.values()]
  }
}

/** Aliases that occur more than once, in order of their first repeat. */
export function findDuplicateAliases(
  configurations: readonly Configuration[],
): ConfigurationAlias[] {
  const seen = new Set<ConfigurationAlias>()
  const duplicates = new Set<ConfigurationAlias>()

  for (const { alias } of configurations) {
    if (seen.has(alias)) duplicates.add(alias)
    seen.add(alias)
  }

  return [...duplicates]
}
