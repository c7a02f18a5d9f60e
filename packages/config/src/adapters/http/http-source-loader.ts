import type { Logger } from "@flagini/logger"
import { FetchError } from "../../core/errors"
import { isSecure } from "../../core/ini/import-path"
import type { LoadOptions, SourceLoader } from "../../ports/source-loader"

/** The slice of the `fetch` API the loader needs. */
export type FetchFn = (url: string) => Promise<{
  ok: boolean
  status: number
  arrayBuffer(): Promise<ArrayBuffer>
}>

export type HttpSourceLoaderDeps = {
  logger: Logger
  /** @default globalThis.fetch */
  fetch?: FetchFn
}

/**
 * Loads config over HTTP(S). Plain `http://` needs `allowUnsecure`.
 */
export class HttpSourceLoader implements SourceLoader {
  private readonly fetch: FetchFn

  constructor(private readonly deps: HttpSourceLoaderDeps) {
    this.fetch = deps.fetch ?? ((url) => globalThis.fetch(url))
  }

  async load(id: string, options: LoadOptions): Promise<Uint8Array> {
    if (!isSecure(id)) {
      if (!options.allowUnsecure) {
        this.deps.logger.warn("Refusing plain http config source", { source: id })
        throw FetchError.unsecure(id)
      }

      this.deps.logger.warn("Loading config over plain http", { source: id })
    }

    let response: Awaited<ReturnType<FetchFn>>

    try {
      response = await this.fetch(id)
    } catch (err) {
      throw FetchError.network(id, err)
    }

    if (!response.ok) throw FetchError.httpStatus(id, response.status)

    try {
      return new Uint8Array(await response.arrayBuffer())
    } catch (err) {
      throw FetchError.network(id, err)
    }
  }
}
