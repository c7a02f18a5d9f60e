import type { Logger } from "@flagini/logger"
import { isRemote } from "../../core/ini/import-path"
import type { LoadOptions, SourceLoader } from "../../ports/source-loader"
import { FileSourceLoader } from "../file/file-source-loader"
import { HttpSourceLoader } from "../http/http-source-loader"

export type RoutingSourceLoaderDeps = {
  logger: Logger
  file?: SourceLoader
  http?: SourceLoader
}

/** Sends `http(s)://` identifiers to one loader and everything else to another. */
export class RoutingSourceLoader implements SourceLoader {
  private readonly file: SourceLoader
  private readonly http: SourceLoader

  constructor(deps: RoutingSourceLoaderDeps) {
    this.file = deps.file ?? new FileSourceLoader()
    this.http = deps.http ?? new HttpSourceLoader({ logger: deps.logger })
  }

  load(id: string, options: LoadOptions): Promise<Uint8Array> {
    return isRemote(id) ? this.http.load(id, options) : this.file.load(id, options)
  }
}
