import type { Clock, Milliseconds } from "@tessera/clock"
import type { Logger } from "@tessera/logger"
import type { ScheduledTask, ScheduledTaskFn, TaskScheduler } from "../../ports/task-scheduler"

export type FixedRateSchedulerDeps = {
  clock: Clock
  logger: Logger
}

type RunningTask = {
  name: string
  controller: AbortController
  loop: Promise<void>
}

/**
 * Runs each task on its own loop paced by the injected clock.
 *
 * Runs start at `start + n * interval`. A run that overshoots its slot is
 * followed immediately by the next one; slots missed in the meantime are not
 * replayed.
 */
export class FixedRateScheduler implements TaskScheduler {
  private readonly running = new Set<RunningTask>()
  private readonly logger: Logger

  constructor(private readonly deps: FixedRateSchedulerDeps) {
    this.logger = deps.logger.child({ module: "task-scheduler" })
  }

  /** Number of tasks whose loop has not exited yet. */
  get size(): number {
    return this.running.size
  }

  scheduleAtFixedRate(
    name: string,
    task: ScheduledTaskFn,
    intervalMs: Milliseconds,
  ): ScheduledTask {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new Error(`Invalid intervalMs: ${intervalMs}`)
    }

    const controller = new AbortController()
    const entry: RunningTask = { name, controller, loop: Promise.resolve() }

    entry.loop = this.runLoop(name, task, intervalMs, controller.signal).finally(() => {
      this.running.delete(entry)
    })
    this.running.add(entry)

    this.logger.debug("Task scheduled", { task: name, intervalMs })

    return {
      name,
      cancel: () => controller.abort(),
    }
  }

  async stop(): Promise<void> {
    const entries = [...this.running]

    for (const entry of entries) entry.controller.abort()

    await Promise.all(entries.map((entry) => entry.loop))
  }

  private async runLoop(
    name: string,
    task: ScheduledTaskFn,
    intervalMs: Milliseconds,
    signal: AbortSignal,
  ): Promise<void> {
    const logger = this.logger.child({ task: name })
    let nextRunAt = this.deps.clock.nowMs() + intervalMs

    while (!signal.aborted) {
      const wait = nextRunAt - this.deps.clock.nowMs()
      if (wait > 0) await this.deps.clock.sleep(wait, signal)
      if (signal.aborted) break

      try {
        await task()
      } catch (err) {
        logger.error("Scheduled task failed", { err })
      }

      nextRunAt = Math.max(nextRunAt + intervalMs, this.deps.clock.nowMs())
    }

    logger.debug("Task stopped")
  }
}
