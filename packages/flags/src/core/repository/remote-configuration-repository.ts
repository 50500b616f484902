import type { Clock, Milliseconds } from "@tessera/clock"
import type { AppError } from "@tessera/errors"
import type { Logger } from "@tessera/logger"
import type { Configuration, ConfigurationAlias } from "../../ports/configuration"
import type { ConfigurationParser } from "../../ports/configuration-parser"
import type {
  ConfigurationRepository,
  ConfigurationSnapshot,
  RefreshOutcome,
  RepositoryStatus,
} from "../../ports/configuration-repository"
import type { ContentLoader } from "../../ports/content-loader"
import type { ScheduledTask, TaskScheduler } from "../../ports/task-scheduler"
import { RepositoryError } from "../errors"
import { findDuplicateAliases, Snapshot } from "../model/snapshot"

export const DEFAULT_REFRESH_INTERVAL_MS: Milliseconds = 60_000

export type RemoteConfigurationRepositoryDeps = {
  loader: ContentLoader
  parser: ConfigurationParser
  scheduler: TaskScheduler
  clock: Clock
  logger: Logger
}

export type RemoteConfigurationRepositoryOptions = {
  /** Interval between refresh cycles. `0` disables scheduled refresh. */
  refreshIntervalMs?: Milliseconds
}

type LoadResult =
  | { kind: "loaded"; configurations: readonly Configuration[] }
  | { kind: "failed"; error: RepositoryError }

/**
 * Read-only mirror of a remote configuration source.
 *
 * Readers get the current snapshot through a single field read; refresh cycles
 * build a complete replacement before swapping it in, so a reader sees either
 * the old or the new snapshot and never waits for I/O.
 */
export class RemoteConfigurationRepository implements ConfigurationRepository {
  private current: Snapshot
  private inFlight: Promise<RefreshOutcome> | undefined
  private consecutiveFailures = 0
  private lastSuccessAt: Date
  private lastFailureAt: Date | undefined
  private task: ScheduledTask | undefined

  private readonly logger: Logger

  private constructor(
    private readonly deps: RemoteConfigurationRepositoryDeps,
    initial: Snapshot,
    logger: Logger,
  ) {
    this.current = initial
    this.lastSuccessAt = initial.loadedAt
    this.logger = logger
  }

  /**
   * Loads the source once and, when `refreshIntervalMs > 0`, schedules refreshes.
   *
   * @throws RepositoryError `invalid_options` for an empty location or a negative
   * interval, `load_failed` or `parse_failed` when the initial load fails.
   */
  static async create(
    deps: RemoteConfigurationRepositoryDeps,
    options: RemoteConfigurationRepositoryOptions = {},
  ): Promise<RemoteConfigurationRepository> {
    const refreshIntervalMs = options.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS
    const location = deps.loader.location

    if (location.trim().length === 0) {
      throw RepositoryError.invalidOptions("location must not be empty", { location })
    }
    if (!Number.isFinite(refreshIntervalMs) || refreshIntervalMs < 0) {
      throw RepositoryError.invalidOptions("refreshIntervalMs must be a finite number >= 0", {
        refreshIntervalMs,
      })
    }

    const logger = deps.logger.child({ module: "configuration-repository", location })

    const result = await load(deps, logger)
    if (result.kind === "failed") {
      logger.error("Initial configuration load failed", { err: result.error })
      throw result.error
    }

    const initial = Snapshot.fromConfigurations(result.configurations, {
      version: 1,
      loadedAt: deps.clock.now(),
    })
    const repository = new RemoteConfigurationRepository(deps, initial, logger)

    logger.info("Configurations loaded", { version: initial.version, count: initial.size })

    if (refreshIntervalMs > 0) {
      repository.task = deps.scheduler.scheduleAtFixedRate(
        "configuration-refresh",
        async () => {
          await repository.refresh()
        },
        refreshIntervalMs,
      )
    } else {
      logger.info("Scheduled refresh disabled")
    }

    return repository
  }

  get(alias: ConfigurationAlias): Configuration | undefined {
    return this.current.get(alias)
  }

  put(alias: ConfigurationAlias, _value: unknown): never {
    throw RepositoryError.readOnly(alias)
  }

  snapshot(): ConfigurationSnapshot {
    return this.current
  }

  status(): RepositoryStatus {
    return {
      state: this.inFlight ? "refreshing" : "ready",
      stale: this.consecutiveFailures > 0,
      consecutiveFailures: this.consecutiveFailures,
      version: this.current.version,
      lastSuccessAt: new Date(this.lastSuccessAt.getTime()),
      ...(this.lastFailureAt && { lastFailureAt: new Date(this.lastFailureAt.getTime()) }),
    }
  }

  refresh(): Promise<RefreshOutcome> {
    if (!this.inFlight) {
      this.inFlight = this.runRefresh().finally(() => {
        this.inFlight = undefined
      })
    }
    return this.inFlight
  }

  /** Cancels the scheduled refresh, if any. An in-flight cycle still completes. */
  cancelRefresh(): void {
    this.task?.cancel()
    this.task = undefined
  }

  private async runRefresh(): Promise<RefreshOutcome> {
    const result = await load(this.deps, this.logger)

    if (result.kind === "failed") {
      return this.recordFailure(result.error)
    }

    const next = Snapshot.fromConfigurations(result.configurations, {
      version: this.current.version + 1,
      loadedAt: this.deps.clock.now(),
    })

    this.current = next
    this.consecutiveFailures = 0
    this.lastSuccessAt = next.loadedAt

    this.logger.debug("Configurations refreshed", { version: next.version, count: next.size })

    return { kind: "refreshed", snapshot: next }
  }

  private recordFailure(error: AppError): RefreshOutcome {
    this.consecutiveFailures++
    this.lastFailureAt = this.deps.clock.now()

    this.logger.error("Configuration refresh failed; keeping previous snapshot", {
      err: error,
      version: this.current.version,
      consecutiveFailures: this.consecutiveFailures,
    })

    return { kind: "failed", error, snapshot: this.current }
  }
}

async function load(
  deps: Pick<RemoteConfigurationRepositoryDeps, "loader" | "parser">,
  logger: Logger,
): Promise<LoadResult> {
  let text: string
  try {
    text = await deps.loader.loadContent()
  } catch (err) {
    return { kind: "failed", error: RepositoryError.loadFailed(deps.loader.location, err) }
  }

  let configurations: readonly Configuration[]
  try {
    configurations = deps.parser.parseConfigurations(text)
  } catch (err) {
    return { kind: "failed", error: RepositoryError.parseFailed(deps.loader.location, err) }
  }

  for (const alias of findDuplicateAliases(configurations)) {
    logger.warn("Duplicate configuration alias; the last definition wins", { alias })
  }

  return { kind: "loaded", configurations }
}
