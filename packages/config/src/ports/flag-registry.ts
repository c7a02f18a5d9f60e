export type FlagKind = "string" | "boolean" | "integer" | "number"

/** A registered flag as the config engine sees it. Every value is a string. */
export type FlagView = Readonly<{
  name: string
  value: string
  defaultValue: string
  usage: string
  isBoolean: boolean
}>

export type FlagDefinition = Readonly<{
  name: string
  kind: FlagKind
  defaultValue: string
  usage: string
}>

export type SetResult =
  | { kind: "accepted"; value: string }
  | { kind: "rejected"; reason: string }

/**
 * The command-line flag registry the config file is layered over.
 *
 * The registry owns value coercion. The config engine only ever hands it
 * strings and reads back the canonical string form.
 */
export interface FlagRegistry {
  lookup(name: string): FlagView | undefined

  /** Checks `value` without storing it. `accepted.value` is the canonical form. */
  validate(name: string, value: string): SetResult

  set(name: string, value: string): SetResult

  /** Every flag, sorted by name. */
  all(): readonly FlagView[]

  /** Names of flags given on the command line through `parseArgs`. */
  explicitlySet(): ReadonlySet<string>

  define(definition: FlagDefinition): void

  /**
   * Parses command-line arguments into the registry.
   *
   * @returns the positional arguments left over
   */
  parseArgs(args: readonly string[]): string[]
}
