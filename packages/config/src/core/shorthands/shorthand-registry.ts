import type { FlagRegistry } from "../../ports/flag-registry"
import { RegistrationError } from "../errors"

export type ShorthandEntry = Readonly<{
  alias: string
  fullName: string
  commandLineVisible: boolean
}>

export class ShorthandRegistry {
  private readonly entries = new Map<string, ShorthandEntry>()
  private sealed = false

  constructor(private readonly flags: Pick<FlagRegistry, "lookup">) {}

  /** Lets config files say `alias = value` for `fullName`. */
  register(alias: string, fullName: string): void {
    this.add(alias, fullName, false)
  }

  /** Like `register`, and also rewrites `-alias` on the command line. */
  registerCommandLine(alias: string, fullName: string): void {
    this.add(alias, fullName, true)
  }

  /** Rejects every later registration. */
  seal(): void {
    this.sealed = true
  }

  resolve(alias: string): string | undefined {
    return this.entries.get(alias)?.fullName
  }

  list(): readonly ShorthandEntry[] {
    return [...this.entries.values()]
  }

  /**
   * Replaces command-line-visible aliases with their full flag names.
   *
   * `-v=2` becomes `-version=2`. A bare `-v` carries the next token along
   * when that token does not start with `-`. Tokens starting with `--` are
   * never rewritten.
   */
  rewriteArgs(args: readonly string[]): string[] {
    const out: string[] = []

    for (let i = 0; i < args.length; i++) {
      const arg = args[i] ?? ""

      if (arg.length < 2 || !arg.startsWith("-") || arg.startsWith("--")) {
        out.push(arg)
        continue
      }

      const eq = arg.indexOf("=")
      const alias = eq === -1 ? arg.slice(1) : arg.slice(1, eq)
      const entry = this.entries.get(alias)

      if (!entry?.commandLineVisible) {
        out.push(arg)
        continue
      }

      if (eq !== -1) {
        out.push(`-${entry.fullName}${arg.slice(eq)}`)
        continue
      }

      out.push(`-${entry.fullName}`)

      const next = args[i + 1]
      if (next !== undefined && !next.startsWith("-")) {
        out.push(next)
        i++
      }
    }

    return out
  }

  /**
   * Renders the shorthand section appended to usage output, or `""` when
   * nothing is registered.
   */
  formatShorthandUsage(): string {
    if (this.entries.size === 0) return ""

    const byFlag = new Map<string, ShorthandEntry[]>()

    for (const entry of this.entries.values()) {
      byFlag.set(entry.fullName, [...(byFlag.get(entry.fullName) ?? []), entry])
    }

    const names = [...byFlag.keys()].sort()
    const width = Math.max(...names.map((name) => name.length))

    const rows = names.map((name) => {
      const entries = byFlag.get(name) ?? []
      const aliases = entries.map((e) => e.alias).sort()
      const marker = entries.some((e) => e.commandLineVisible) ? " (command-line)" : ""
      const pad = " ".repeat(width - name.length + 1)

      return `  -${name}${pad} -[${aliases.join(", ")}]${marker}\n`
    })

    return `\nRegistered flag shorthands:\n${rows.join("")}`
  }

  private add(alias: string, fullName: string, commandLineVisible: boolean): void {
    const operation = commandLineVisible ? "registerCommandLineShorthand" : "registerShorthand"

    if (this.sealed) throw RegistrationError.afterParse(operation)
    if (!this.flags.lookup(fullName)) throw RegistrationError.unknownFlag(operation, fullName)

    const existing = this.entries.get(alias)
    if (existing) throw RegistrationError.shorthandTaken(alias, existing.fullName)
    if (this.flags.lookup(alias)) throw RegistrationError.shorthandIsFlag(alias)

    this.entries.set(alias, Object.freeze({ alias, fullName, commandLineVisible }))
  }
}
