import type { Milliseconds, Sleeper } from "@flagini/clock"
import type { Logger } from "@flagini/logger"
import type { ReloadOutcome } from "../../ports/directive"
import type { ReloadTrigger } from "../../ports/reload-trigger"

export type ReloadSchedulerState = "idle" | "scheduled" | "triggered"

export type ReloadSchedulerDeps = {
  clock: Sleeper
  triggers: readonly ReloadTrigger[]
  logger: Logger
}

export type ReloadSchedulerOptions = {
  /** Read before every sleep. Zero or less ends the timer loop. */
  intervalMs: () => Milliseconds
  reload: () => Promise<ReloadOutcome>
}

/**
 * Drives reloads from a timer and from external triggers.
 */
export class ReloadScheduler {
  private running = false
  private timerActive = false
  private abort = new AbortController()
  private loop: Promise<void> | undefined
  private unsubscribers: Array<() => void> = []
  private readonly inFlight = new Set<Promise<void>>()

  constructor(
    private readonly deps: ReloadSchedulerDeps,
    private readonly opts: ReloadSchedulerOptions,
  ) {}

  get state(): ReloadSchedulerState {
    if (this.inFlight.size > 0) return "triggered"
    if (this.timerActive) return "scheduled"

    return "idle"
  }

  start(): void {
    if (this.running) return

    this.running = true
    this.abort = new AbortController()
    this.unsubscribers = this.deps.triggers.map((trigger) =>
      trigger.subscribe(() => this.onTrigger(trigger.name)),
    )
    this.loop = this.runLoop()
  }

  /** Cancels the timer, drops the triggers and waits for running passes. */
  async stop(): Promise<void> {
    this.running = false
    this.abort.abort()

    for (const unsubscribe of this.unsubscribers) unsubscribe()
    this.unsubscribers = []

    await this.loop
    await Promise.all([...this.inFlight])

    this.loop = undefined
  }

  private async runLoop(): Promise<void> {
    this.timerActive = true

    try {
      while (this.running) {
        const interval = this.opts.intervalMs()
        if (interval <= 0) break

        await this.deps.clock.sleep(interval, this.abort.signal)
        if (!this.running) break

        await this.runPass("timer")
      }
    } finally {
      this.timerActive = false
    }
  }

  private onTrigger(name: string): void {
    if (!this.running) return

    this.deps.logger.info("Reload requested", { trigger: name })

    void this.runPass(name)
  }

  private runPass(reason: string): Promise<void> {
    const pass = this.opts
      .reload()
      .then(() => undefined)
      .catch((err: unknown) => {
        this.deps.logger.error("Reload pass threw", { reason, err })
      })
      .finally(() => {
        this.inFlight.delete(pass)
      })

    this.inFlight.add(pass)

    return pass
  }
}
