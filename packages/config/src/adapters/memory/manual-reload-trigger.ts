import type { ReloadTrigger } from "../../ports/reload-trigger"

export class ManualReloadTrigger implements ReloadTrigger {
  private readonly listeners = new Set<() => void>()

  constructor(readonly name = "manual") {}

  subscribe(listener: () => void): () => void {
    const entry = () => listener()
    this.listeners.add(entry)

    return () => {
      this.listeners.delete(entry)
    }
  }

  fire(): void {
    for (const listener of [...this.listeners]) listener()
  }

  get subscriberCount(): number {
    return this.listeners.size
  }
}
