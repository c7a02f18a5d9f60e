import fs from "node:fs/promises"
import path from "node:path"
import { FetchError } from "../../core/errors"
import type { SourceLoader } from "../../ports/source-loader"

export type FileSourceLoaderOptions = {
  /**
   * Base directory for relative paths.
   *
   * @default process.cwd()
   */
  cwd?: string
}

export class FileSourceLoader implements SourceLoader {
  constructor(private readonly opts: FileSourceLoaderOptions = {}) {}

  async load(id: string): Promise<Uint8Array> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), id)

    try {
      return await fs.readFile(filePath)
    } catch (err) {
      throw FetchError.unreadable(id, err)
    }
  }
}
