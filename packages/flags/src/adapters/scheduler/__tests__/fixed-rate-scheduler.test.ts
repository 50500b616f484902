import { FakeClock } from "@tessera/clock"
import { MemoryLogger } from "@tessera/logger"
import { FixedRateScheduler } from "../fixed-rate-scheduler"

describe("FixedRateScheduler", () => {
  let clock: FakeClock
  let logger: MemoryLogger
  let scheduler: FixedRateScheduler

  beforeEach(() => {
    clock = new FakeClock(0)
    logger = new MemoryLogger()
    scheduler = new FixedRateScheduler({ clock, logger })
  })

  afterEach(async () => {
    await scheduler.stop()
  })

  it("runs the task once per interval, first after one interval", async () => {
    const runs: number[] = []
    scheduler.scheduleAtFixedRate("tick", async () => {
      runs.push(clock.nowMs())
    }, 1_000)

    await clock.advance(999)
    expect(runs).toEqual([])

    await clock.advance(2_001)
    expect(runs).toEqual([1_000, 2_000, 3_000])
  })

  it("keeps running after a task fails and logs the failure", async () => {
    const err = new Error("boom")
    const task = vi.fn<() => Promise<void>>().mockRejectedValueOnce(err).mockResolvedValue()
    scheduler.scheduleAtFixedRate("refresh", task, 100)

    await clock.advance(300)

    expect(task).toHaveBeenCalledTimes(3)
    expect(logger.at("error")).toEqual([
      {
        level: "error",
        message: "Scheduled task failed",
        fields: { module: "task-scheduler", task: "refresh", err },
      },
    ])
  })

  it("never overlaps runs and starts a late run right after the previous one", async () => {
    const starts: number[] = []
    let active = 0
    let maxActive = 0

    scheduler.scheduleAtFixedRate("slow", async () => {
      starts.push(clock.nowMs())
      active++
      maxActive = Math.max(maxActive, active)
      if (starts.length === 1) await clock.sleep(2_500)
      active--
    }, 1_000)

    await clock.advance(5_000)

    expect(maxActive).toBe(1)
    expect(starts).toEqual([1_000, 3_500, 4_500])
  })

  it("stops a task when it is cancelled", async () => {
    const task = vi.fn(async () => {})
    const handle = scheduler.scheduleAtFixedRate("tick", task, 1_000)

    await clock.advance(1_000)
    handle.cancel()
    await clock.advance(5_000)

    expect(handle.name).toBe("tick")
    expect(task).toHaveBeenCalledTimes(1)
    expect(scheduler.size).toBe(0)
  })

  it("stop() cancels every task and waits for a running one", async () => {
    let finished = false
    scheduler.scheduleAtFixedRate("slow", async () => {
      await clock.sleep(500)
      finished = true
    }, 1_000)
    scheduler.scheduleAtFixedRate("idle", async () => {}, 10_000)

    await clock.advance(1_000)
    const stopping = scheduler.stop()
    await clock.advance(500)
    await stopping

    expect(finished).toBe(true)
    expect(scheduler.size).toBe(0)
  })

  it.each([0, -5, Number.POSITIVE_INFINITY])("rejects an interval of %s", (intervalMs) => {
    expect(() => scheduler.scheduleAtFixedRate("bad", async () => {}, intervalMs)).toThrow(
      `Invalid intervalMs: ${intervalMs}`,
    )
  })
})
