import type { Milliseconds } from "@tessera/clock"

export type ScheduledTaskFn = () => Promise<void>

export interface ScheduledTask {
  readonly name: string
  cancel(): void
}

export interface TaskScheduler {
  /**
   * Runs `task` every `intervalMs`, first after one interval. Runs never overlap;
   * a run that overshoots its slot delays the next one.
   */
  scheduleAtFixedRate(name: string, task: ScheduledTaskFn, intervalMs: Milliseconds): ScheduledTask

  /** Cancels every task and waits for in-flight runs to finish. */
  stop(): Promise<void>
}
