import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

type PendingSleep = {
  wakeAt: Milliseconds
  wake: () => void
}

/**
 * A clock that only moves when told to.
 *
 * `sleep()` parks the caller until `advance()` or `set()` carries the time
 * past its deadline, or until its signal aborts.
 */
export class ManualClock implements Clock {
  private time: Milliseconds
  private readonly sleepers = new Set<PendingSleep>()

  constructor(start: Milliseconds = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.set(this.time + ms)
  }

  set(ms: Milliseconds): void {
    this.time = ms
    this.wakeDue()
  }

  /** Number of sleeps still waiting for time to move. */
  get pendingSleeps(): number {
    return this.sleepers.size
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return Promise.resolve()
    if (signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const onAbort = () => {
        this.sleepers.delete(pending)
        resolve()
      }

      const pending: PendingSleep = {
        wakeAt: this.time + ms,
        wake: () => {
          signal?.removeEventListener("abort", onAbort)
          resolve()
        },
      }

      this.sleepers.add(pending)
      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }

  private wakeDue(): void {
    for (const pending of [...this.sleepers]) {
      if (pending.wakeAt > this.time) continue

      this.sleepers.delete(pending)
      pending.wake()
    }
  }
}
