import type { Milliseconds } from "./time"

export type TimeSource = {
  now(): Date

  /** Wall-clock time in epoch milliseconds. Use this for arithmetic. */
  nowMs(): Milliseconds
}

export interface Sleeper {
  /** Waits `ms` milliseconds. An aborted `signal` resolves the wait early. */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
