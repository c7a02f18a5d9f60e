import type { ReloadTrigger } from "../../ports/reload-trigger"

/** Requests a reload whenever the process receives `signal`. */
export class SignalReloadTrigger implements ReloadTrigger {
  readonly name: string

  constructor(private readonly signal: NodeJS.Signals = "SIGHUP") {
    this.name = `signal:${signal}`
  }

  subscribe(listener: () => void): () => void {
    const handler = () => listener()

    process.on(this.signal, handler)

    return () => {
      process.off(this.signal, handler)
    }
  }
}
