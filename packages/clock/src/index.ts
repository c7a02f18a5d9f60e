export { ManualClock } from "./adapters/manual-clock"
export { SystemClock, type SystemClockOptions } from "./adapters/system-clock"
export type { Clock, Sleeper, TimeSource } from "./ports/clock"
export type { Milliseconds } from "./ports/time"
