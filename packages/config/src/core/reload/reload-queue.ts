import type { ReloadOutcome } from "../../ports/directive"

type Pass = () => Promise<ReloadOutcome>

/**
 * Runs reload passes one at a time.
 *
 * A request made while a pass is running does not start a second concurrent
 * pass. All such requests share one follow-up pass that starts when the
 * current one settles.
 */
export class ReloadQueue {
  private active: Promise<ReloadOutcome> | undefined
  private queued: Promise<ReloadOutcome> | undefined

  constructor(private readonly pass: Pass) {}

  get busy(): boolean {
    return this.active !== undefined
  }

  request(): Promise<ReloadOutcome> {
    if (this.queued) return this.queued

    const running = this.active
    if (!running) return this.start()

    const next = () => {
      this.queued = undefined
      return this.start()
    }

    this.queued = running.then(next, next)

    return this.queued
  }

  /** Resolves once no pass is running or queued. */
  async idle(): Promise<void> {
    while (this.active || this.queued) {
      await (this.queued ?? this.active)
    }
  }

  private start(): Promise<ReloadOutcome> {
    const run = this.pass().finally(() => {
      if (this.active === run) this.active = undefined
    })

    this.active = run

    return run
  }
}
