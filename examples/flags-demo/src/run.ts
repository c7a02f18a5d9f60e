import {
  FlagFileSession,
  type FlagFileSessionDeps,
  type FlagFileSessionOptions,
  MemoryFlagRegistry,
} from "@flagini/config"
import { createPinoLogger } from "@flagini/logger"
import { type DemoFlags, defineFlags } from "./define-flags"

export type RunOptions = FlagFileSessionOptions & Partial<Omit<FlagFileSessionDeps, "registry">>

export type RunningDemo = {
  flags: DemoFlags
  session: FlagFileSession
}

/**
 * Parses the demo flags, logs every change and keeps reloading the config
 * until `session.stop()`.
 */
export async function run(options: RunOptions = {}): Promise<RunningDemo> {
  const { argv, executablePath, controlFlagNames, ...deps } = options
  const logger =
    deps.logger ??
    createPinoLogger({}, { level: "info", prettify: process.stdout.isTTY }, { service: "flags-demo" })

  const registry = new MemoryFlagRegistry()
  const flags = defineFlags(registry)

  const session = new FlagFileSession(
    { ...deps, registry, logger },
    { argv, executablePath, controlFlagNames },
  )

  session.registerCommandLineShorthand("a", "addr")
  session.registerShorthand("w", "workers")
  session.excludeFromDump(flags.apiKey.name)

  for (const flag of [flags.addr, flags.workers, flags.ratio, flags.verbose, flags.greeting]) {
    session.onFlagChange(flag.name, ({ name, value, previousValue }) => {
      logger.info("Flag value", { flag: name, value, previousValue })
    })
  }

  await session.parse()

  logger.info("Flags loaded", {
    generation: session.generation,
    addr: flags.addr.get(),
    workers: flags.workers.get(),
  })

  return { flags, session }
}
