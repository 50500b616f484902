import { type AppContextOptions, createAppContext } from "./app/create-context"
import { runStopHooks } from "./app/lifecycle/stop"

const shutdownSignals = ["SIGINT", "SIGTERM"] as const

export async function run(options: AppContextOptions = {}): Promise<void> {
  const ctx = await createAppContext(options)
  const { logger } = ctx.services.core
  const { repository } = ctx.services.domains.flags

  logger.info("Flag service started", {
    location: ctx.infra.flagSource.location,
    version: repository.status().version,
    refreshIntervalMs: ctx.config.flags.refreshIntervalMs,
  })

  for (const signal of shutdownSignals) {
    process.once(signal, () => {
      logger.info("Shutting down", { signal })
      runStopHooks(ctx).then(
        () => process.exit(0),
        (err: unknown) => {
          logger.fatal("Shutdown failed", { err })
          process.exit(1)
        },
      )
    })
  }
}
