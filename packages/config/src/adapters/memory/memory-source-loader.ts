import { FetchError } from "../../core/errors"
import type { SourceLoader } from "../../ports/source-loader"

/**
 * Serves config sources from memory. Content can be swapped between loads,
 * which makes it handy for exercising reloads.
 */
export class MemorySourceLoader implements SourceLoader {
  private readonly sources = new Map<string, Uint8Array>()
  private readonly encoder = new TextEncoder()

  constructor(initial: Readonly<Record<string, string | Uint8Array>> = {}) {
    for (const [id, content] of Object.entries(initial)) this.set(id, content)
  }

  set(id: string, content: string | Uint8Array): void {
    this.sources.set(id, typeof content === "string" ? this.encoder.encode(content) : content)
  }

  delete(id: string): void {
    this.sources.delete(id)
  }

  async load(id: string): Promise<Uint8Array> {
    const bytes = this.sources.get(id)
    if (!bytes) throw FetchError.unreadable(id, new Error("no such source"))

    return bytes.slice()
  }
}
