import type { Milliseconds } from "./time"

export type TimeSource = {
  /** Wall-clock time. Use `nowMs()` for arithmetic. */
  now(): Date

  /** Milliseconds since the Unix epoch. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /**
   * Waits `ms` milliseconds.
   *
   * Resolves (never rejects) as soon as `signal` aborts, so loops can use it as
   * an interruptible wait.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
