import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

type PendingSleep = {
  wakeAt: Milliseconds
  seq: number
  wake: () => void
}

/**
 * Manually driven clock.
 *
 * `sleep()` parks the caller until `advance()` moves time past its deadline.
 * Sleepers wake in deadline order and the event loop is allowed to settle after
 * each wake-up, so code that sleeps again in a loop is rescheduled before the
 * next deadline is considered.
 */
export class FakeClock implements Clock {
  private time: Milliseconds
  private seq = 0
  private pending: PendingSleep[] = []

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  /** Number of callers currently parked in `sleep()`. */
  get sleepers(): number {
    return this.pending.length
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const entry: PendingSleep = {
        wakeAt: this.time + ms,
        seq: this.seq++,
        wake: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
      }

      const onAbort = () => {
        this.pending = this.pending.filter((p) => p !== entry)
        resolve()
      }

      this.pending.push(entry)
      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  async advance(ms: Milliseconds): Promise<void> {
    const target = this.time + ms

    for (;;) {
      const next = this.nextDue(target)
      if (!next) break

      this.time = Math.max(this.time, next.wakeAt)
      this.pending = this.pending.filter((p) => p !== next)
      next.wake()

      await settle()
    }

    this.time = target
    await settle()
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }

  private nextDue(target: Milliseconds): PendingSleep | undefined {
    let next: PendingSleep | undefined

    for (const entry of this.pending) {
      if (entry.wakeAt > target) continue
      if (
        !next ||
        entry.wakeAt < next.wakeAt ||
        (entry.wakeAt === next.wakeAt && entry.seq < next.seq)
      ) {
        next = entry
      }
    }

    return next
  }
}

function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}
