import { type Clock, type Milliseconds, SystemClock } from "@flagini/clock"
import { toAppError } from "@flagini/errors"
import { createPinoLogger, type Logger } from "@flagini/logger"
import { RoutingSourceLoader } from "../../adapters/routing/routing-source-loader"
import { SignalReloadTrigger } from "../../adapters/signal/signal-reload-trigger"
import type { ChangeSet, ReloadOutcome } from "../../ports/directive"
import type { FlagRegistry } from "../../ports/flag-registry"
import type { ReloadTrigger } from "../../ports/reload-trigger"
import type { SourceLoader } from "../../ports/source-loader"
import { dumpFlags } from "../dump/dump"
import { DuplicateParseError, RegistrationError, SetValueError } from "../errors"
import { resolveImportPath } from "../ini/import-path"
import { IniParser } from "../ini/ini-parser"
import { MergeEngine } from "../merge/merge-engine"
import { ChangeBus, type FlagChangeCallback } from "../notify/change-bus"
import { ReloadQueue } from "../reload/reload-queue"
import { ReloadScheduler } from "../reload/reload-scheduler"
import { ShorthandRegistry } from "../shorthands/shorthand-registry"
import {
  type ControlFlagNames,
  type ControlSettings,
  controlFlagDefinitions,
  defaultControlFlagNames,
  readControlSettings,
} from "./control-flags"
import { formatFlagUsage } from "./usage"

export type FlagFileSessionDeps = {
  registry: FlagRegistry
  /** @default RoutingSourceLoader over the filesystem and fetch */
  loader?: SourceLoader
  /** @default pino at info level, written to stderr */
  logger?: Logger
  /** @default SystemClock with unref'd timers */
  clock?: Clock
  /** @default a single SIGHUP trigger */
  reloadTriggers?: readonly ReloadTrigger[]
  /** Where `dumpflags` writes. @default process.stdout */
  output?: { write(chunk: string): unknown }
  /** Called after a dump. @default process.exit */
  exit?: (code: number) => void
}

export type FlagFileSessionOptions = {
  /** @default process.argv.slice(2) */
  argv?: readonly string[]
  /** Relative config paths resolve against this file's directory. @default process.argv[1] */
  executablePath?: string
  controlFlagNames?: Partial<ControlFlagNames>
}

/**
 * Layers an INI config file over a command-line flag registry.
 *
 * Priority is command line, then config file, then flag default. After
 * `parse()` the file is re-read on a timer and on every reload trigger;
 * flags that change notify their `onFlagChange` callbacks.
 *
 * @example
 * ```ts
 * const registry = new MemoryFlagRegistry()
 * const addr = registry.string("addr", ":8080", "Listen address")
 *
 * const session = new FlagFileSession({ registry })
 * session.setConfigFile("./app.ini")
 * session.onFlagChange("addr", ({ value }) => rebind(value))
 *
 * await session.parse()
 * addr.get()
 * ```
 */
export class FlagFileSession {
  private readonly logger: Logger
  private readonly names: ControlFlagNames
  private readonly shorthands: ShorthandRegistry
  private readonly bus: ChangeBus
  private readonly parser: IniParser
  private readonly merge: MergeEngine
  private readonly queue: ReloadQueue
  private readonly scheduler: ReloadScheduler
  private readonly dumpExclusions: Set<string>

  private parsed = false
  private ready = false
  private generationCount = 0
  private commandLineFlags: ReadonlySet<string> = new Set()
  private positionals: readonly string[] = []

  constructor(
    private readonly deps: FlagFileSessionDeps,
    private readonly options: FlagFileSessionOptions = {},
  ) {
    const registry = deps.registry

    this.logger = (
      deps.logger ?? createPinoLogger({ destination: process.stderr }, { level: "info" })
    ).child({ module: "flagini" })

    this.names = { ...defaultControlFlagNames, ...options.controlFlagNames }

    for (const definition of controlFlagDefinitions(this.names)) registry.define(definition)

    this.dumpExclusions = new Set(Object.values(this.names))
    this.shorthands = new ShorthandRegistry(registry)
    this.bus = new ChangeBus({ registry, logger: this.logger })
    this.parser = new IniParser({
      loader: deps.loader ?? new RoutingSourceLoader({ logger: this.logger }),
      logger: this.logger,
    })
    this.merge = new MergeEngine({ registry, shorthands: this.shorthands, logger: this.logger })
    this.queue = new ReloadQueue(() => this.reloadPass())
    this.scheduler = new ReloadScheduler(
      {
        clock: deps.clock ?? new SystemClock({ unref: true }),
        triggers: deps.reloadTriggers ?? [new SignalReloadTrigger()],
        logger: this.logger,
      },
      {
        intervalMs: () => this.reloadInterval(),
        reload: () => this.queue.request(),
      },
    )
  }

  /** Incremented once by `parse()` and once per reload that changed a flag. */
  get generation(): number {
    return this.generationCount
  }

  /** Command-line arguments left after the flags. */
  get args(): readonly string[] {
    return this.positionals
  }

  setConfigFile(path: string): void {
    this.setControl("setConfigFile", this.names.config, path)
  }

  setAllowUnknownFlags(allowed: boolean): void {
    this.setControl("setAllowUnknownFlags", this.names.allowUnknownFlags, String(allowed))
  }

  setAllowMissingConfig(allowed: boolean): void {
    this.setControl("setAllowMissingConfig", this.names.allowMissingConfig, String(allowed))
  }

  setConfigUpdateInterval(interval: Milliseconds): void {
    this.setControl("setConfigUpdateInterval", this.names.configUpdateIntervalMs, String(interval))
  }

  setAllowUnsecure(allowed: boolean): void {
    this.setControl("setAllowUnsecure", this.names.unsecure, String(allowed))
  }

  registerShorthand(alias: string, fullName: string): void {
    this.shorthands.register(alias, fullName)
  }

  registerCommandLineShorthand(alias: string, fullName: string): void {
    this.shorthands.registerCommandLine(alias, fullName)
  }

  /**
   * Calls `callback` after `parse()` and whenever a reload changes
   * `flagName`. Callbacks for one flag run in registration order.
   */
  onFlagChange(flagName: string, callback: FlagChangeCallback): void {
    this.bus.subscribe(flagName, callback)
  }

  /** Keeps a flag, such as a secret, out of `dump()`. */
  excludeFromDump(flagName: string): void {
    this.dumpExclusions.add(flagName)
  }

  dump(): string {
    return dumpFlags(this.deps.registry.all(), this.dumpExclusions)
  }

  usage(): string {
    return formatFlagUsage(this.deps.registry.all()) + this.shorthands.formatShorthandUsage()
  }

  /**
   * Reads the command line, then the config file, then starts reloading.
   *
   * Throws `DuplicateParseError` synchronously on a second call. Any other
   * failure is logged at fatal level and rejects the returned promise.
   */
  parse(): Promise<void> {
    if (this.parsed) throw DuplicateParseError.secondCall()

    this.parsed = true
    this.shorthands.seal()

    return this.runParse()
  }

  /** Re-reads the config file now. Concurrent calls share one pass. */
  reload(): Promise<ReloadOutcome> {
    if (!this.ready) throw RegistrationError.beforeParse("reload")

    return this.queue.request()
  }

  /** Stops the timer and the triggers, then waits for a running pass. */
  async stop(): Promise<void> {
    await this.scheduler.stop()
    await this.queue.idle()
  }

  private async runParse(): Promise<void> {
    let controls: ControlSettings

    try {
      const argv = this.options.argv ?? process.argv.slice(2)

      this.positionals = this.deps.registry.parseArgs(this.shorthands.rewriteArgs(argv))
      this.commandLineFlags = this.deps.registry.explicitlySet()
      this.bus.verify()

      await this.applyConfig()

      controls = readControlSettings(this.deps.registry, this.names)
    } catch (err) {
      const error = toAppError(err)

      this.logger.fatal("Failed to load config", { err: error })

      throw error
    }

    if (controls.dumpFlags) {
      this.writeDump()
      return
    }

    this.generationCount++
    this.ready = true
    this.bus.emitAll()
    this.scheduler.start()
  }

  private async reloadPass(): Promise<ReloadOutcome> {
    try {
      const changeSet = await this.applyConfig()

      if (changeSet.size === 0) return { kind: "unchanged" }

      this.generationCount++

      const generation = this.generationCount

      this.logger.info("Read updated config", {
        generation,
        modified: this.describeChanges(changeSet),
      })
      this.bus.emitChanges(changeSet)

      return { kind: "changed", changeSet, generation }
    } catch (err) {
      const error = toAppError(err)

      this.logger.error("Failed to reload config", { err: error })

      return { kind: "failed", error }
    }
  }

  private async applyConfig(): Promise<ChangeSet> {
    const controls = readControlSettings(this.deps.registry, this.names)
    const source = this.resolveConfigPath(controls.configPath)

    if (source === "") return new Map()

    const directives = await this.parser.parse(source, {
      allowMissing: controls.allowMissingConfig,
      allowUnsecure: controls.allowUnsecure,
    })

    const plan = this.merge.plan(directives, {
      commandLineFlags: this.commandLineFlags,
      allowUnknownFlags: controls.allowUnknownFlags,
    })

    return this.merge.commit(plan)
  }

  private resolveConfigPath(configPath: string): string {
    if (configPath.startsWith("./")) return configPath

    return resolveImportPath(this.options.executablePath ?? process.argv[1] ?? "", configPath)
  }

  private reloadInterval(): Milliseconds {
    try {
      return readControlSettings(this.deps.registry, this.names).configUpdateIntervalMs
    } catch (err) {
      this.logger.error("Cannot read reload interval, stopping timer", { err })
      return 0
    }
  }

  private describeChanges(changeSet: ChangeSet): Record<string, string> {
    return Object.fromEntries(
      [...changeSet.keys()].map((name) => [name, this.deps.registry.lookup(name)?.value ?? ""]),
    )
  }

  private writeDump(): void {
    const output = this.deps.output ?? process.stdout
    const exit = this.deps.exit ?? ((code: number) => process.exit(code))

    output.write(this.dump())
    exit(0)
  }

  private setControl(operation: string, flag: string, value: string): void {
    if (this.parsed) throw RegistrationError.afterParse(operation)

    const result = this.deps.registry.set(flag, value)

    if (result.kind === "rejected") throw SetValueError.rejected(flag, value, result.reason)
  }
}
