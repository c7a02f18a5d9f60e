import type { Logger } from "@flagini/logger"
import type { Directive } from "../../ports/directive"
import type { SourceLoader } from "../../ports/source-loader"
import { CyclicImportError, FetchError } from "../errors"
import { resolveImportPath } from "./import-path"
import { tokenizeIni } from "./ini-tokenizer"
import { decodeLines } from "./line-decoder"

export type IniParserDeps = {
  loader: SourceLoader
  logger: Logger
}

export type IniParseOptions = {
  /** Treat a source that cannot be fetched as empty. Applies to imports too. */
  allowMissing?: boolean
  allowUnsecure?: boolean
}

/**
 * Loads a config source and every source it `#import`s, in document order.
 */
export class IniParser {
  constructor(private readonly deps: IniParserDeps) {}

  parse(sourceId: string, options: IniParseOptions = {}): Promise<Directive[]> {
    return this.parseSource(sourceId, [], options)
  }

  private async parseSource(
    sourceId: string,
    ancestors: readonly string[],
    options: IniParseOptions,
  ): Promise<Directive[]> {
    if (ancestors.includes(sourceId)) {
      throw CyclicImportError.detected(sourceId, [...ancestors, sourceId])
    }

    const bytes = await this.fetch(sourceId, options)
    if (!bytes) return []

    const stack = [...ancestors, sourceId]
    const directives: Directive[] = []

    for (const token of tokenizeIni(decodeLines(bytes, sourceId), sourceId)) {
      if (token.kind === "directive") {
        directives.push(token.directive)
        continue
      }

      const imported = resolveImportPath(sourceId, token.path)

      this.deps.logger.debug("Importing config source", {
        source: sourceId,
        line: token.lineNumber,
        imported,
      })

      directives.push(...(await this.parseSource(imported, stack, options)))
    }

    return directives
  }

  private async fetch(
    sourceId: string,
    options: IniParseOptions,
  ): Promise<Uint8Array | undefined> {
    try {
      return await this.deps.loader.load(sourceId, {
        allowUnsecure: options.allowUnsecure ?? false,
      })
    } catch (err) {
      if (options.allowMissing && err instanceof FetchError) {
        this.deps.logger.debug("Config source missing, treating as empty", {
          source: sourceId,
          err,
        })
        return undefined
      }

      throw err
    }
  }
}
