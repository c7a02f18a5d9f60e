import type { Clock } from "../ports/clock"
import type { Milliseconds } from "../ports/time"

export type SystemClockOptions = {
  /**
   * Keep a pending `sleep()` from holding the process open.
   *
   * @default false
   */
  unref?: boolean
}

export class SystemClock implements Clock {
  constructor(private readonly opts: SystemClockOptions = {}) {}

  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }

  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return Promise.resolve()

    return new Promise((resolve) => {
      const onAbort = () => {
        clearTimeout(timer)
        resolve()
      }

      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort)
        resolve()
      }, ms)

      if (this.opts.unref) timer.unref()

      signal?.addEventListener("abort", onAbort, { once: true })
    })
  }
}
