import { createNullLogger } from "@flagini/logger"
import { RoutingSourceLoader } from "../../adapters/routing/routing-source-loader"
import type { Directive } from "../../ports/directive"
import { type IniParseOptions, IniParser, type IniParserDeps } from "./ini-parser"

/**
 * Reads a config source and its imports without touching any registry.
 */
export function readIniFile(
  sourceId: string,
  deps: Partial<IniParserDeps> = {},
  options: IniParseOptions = {},
): Promise<Directive[]> {
  const logger = deps.logger ?? createNullLogger()
  const loader = deps.loader ?? new RoutingSourceLoader({ logger })

  return new IniParser({ loader, logger }).parse(sourceId, options)
}
