import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

type Sleeper = {
  wakeAt: UnixMs
  wake: () => void
}

/**
 * Manually driven clock for tests.
 *
 * `sleep()` stays pending until `advance()` or `set()` moves time to its
 * wake-up point, or its signal aborts.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private sleepers: Sleeper[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: UnixMs): void {
    this.time = ms
    this.wakeDue()
  }

  /** Number of sleeps still waiting for time to move. */
  get pendingSleeps(): number {
    return this.sleepers.length
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const sleeper: Sleeper = {
        wakeAt: this.time + ms,
        wake: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
      }

      const onAbort = () => {
        this.sleepers = this.sleepers.filter((s) => s !== sleeper)
        sleeper.wake()
      }

      this.sleepers.push(sleeper)
      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  private wakeDue(): void {
    const due = this.sleepers.filter((s) => s.wakeAt <= this.time)
    this.sleepers = this.sleepers.filter((s) => s.wakeAt > this.time)

    for (const sleeper of due) sleeper.wake()
  }
}
