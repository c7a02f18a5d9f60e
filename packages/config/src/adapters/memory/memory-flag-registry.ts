import { z } from "zod"
import { ArgumentError, RegistrationError, SetValueError, UnknownFlagError } from "../../core/errors"
import type {
  FlagDefinition,
  FlagKind,
  FlagRegistry,
  FlagView,
  SetResult,
} from "../../ports/flag-registry"

const flagSchemas = {
  string: z.string(),
  boolean: z.stringbool({ truthy: ["1", "t", "true"], falsy: ["0", "f", "false"] }),
  integer: z
    .string()
    .trim()
    .regex(/^[+-]?\d+$/, "expected an integer")
    .transform(Number)
    .pipe(z.int()),
  number: z.string().trim().min(1, "expected a number").transform(Number).pipe(z.number()),
} satisfies Record<FlagKind, z.ZodType<unknown, string>>

/** Typed access to one flag's live value. */
export type FlagHandle<T> = Readonly<{
  name: string
  get(): T
}>

type FlagEntry = {
  definition: FlagDefinition
  value: string
}

/**
 * In-process flag registry with single-dash command-line parsing.
 *
 * Values are stored in canonical string form: `"1"` for a boolean is kept
 * as `"true"`, `"+7"` for an integer as `"7"`.
 */
export class MemoryFlagRegistry implements FlagRegistry {
  private readonly flags = new Map<string, FlagEntry>()
  private readonly commandLine = new Set<string>()

  string(name: string, defaultValue: string, usage: string): FlagHandle<string> {
    return this.defineTyped(name, "string", defaultValue, usage, flagSchemas.string)
  }

  boolean(name: string, defaultValue: boolean, usage: string): FlagHandle<boolean> {
    return this.defineTyped(name, "boolean", String(defaultValue), usage, flagSchemas.boolean)
  }

  integer(name: string, defaultValue: number, usage: string): FlagHandle<number> {
    return this.defineTyped(name, "integer", String(defaultValue), usage, flagSchemas.integer)
  }

  number(name: string, defaultValue: number, usage: string): FlagHandle<number> {
    return this.defineTyped(name, "number", String(defaultValue), usage, flagSchemas.number)
  }

  define(definition: FlagDefinition): void {
    if (this.flags.has(definition.name)) {
      throw RegistrationError.duplicateFlag(definition.name)
    }

    const result = canonicalize(definition.kind, definition.defaultValue)

    if (result.kind === "rejected") {
      throw RegistrationError.invalidDefault(definition.name, result.reason)
    }

    this.flags.set(definition.name, {
      definition: { ...definition, defaultValue: result.value },
      value: result.value,
    })
  }

  lookup(name: string): FlagView | undefined {
    const entry = this.flags.get(name)

    return entry && toView(entry)
  }

  validate(name: string, value: string): SetResult {
    const entry = this.flags.get(name)
    if (!entry) return { kind: "rejected", reason: `unknown flag ${name}` }

    return canonicalize(entry.definition.kind, value)
  }

  set(name: string, value: string): SetResult {
    const result = this.validate(name, value)
    const entry = this.flags.get(name)

    if (entry && result.kind === "accepted") entry.value = result.value

    return result
  }

  all(): readonly FlagView[] {
    return [...this.flags.values()]
      .map(toView)
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  }

  explicitlySet(): ReadonlySet<string> {
    return new Set(this.commandLine)
  }

  /**
   * Accepts `-name`, `--name`, `-name=value` and `-name value`. Boolean
   * flags take no separate value. Parsing stops at the first non-flag
   * argument or after `--`.
   */
  parseArgs(args: readonly string[]): string[] {
    for (let i = 0; i < args.length; i++) {
      const arg = args[i] ?? ""

      if (arg === "--") return args.slice(i + 1)
      if (arg.length < 2 || !arg.startsWith("-")) return args.slice(i)

      const body = arg.slice(arg.startsWith("--") ? 2 : 1)
      if (body === "" || body.startsWith("-") || body.startsWith("=")) {
        throw ArgumentError.badSyntax(arg)
      }

      const eq = body.indexOf("=")
      const name = eq === -1 ? body : body.slice(0, eq)
      const entry = this.flags.get(name)

      if (!entry) throw UnknownFlagError.onCommandLine(name)

      let value = eq === -1 ? undefined : body.slice(eq + 1)

      if (value === undefined && entry.definition.kind === "boolean") value = "true"
      if (value === undefined) {
        value = args[i + 1]
        if (value === undefined) throw ArgumentError.missingValue(name)
        i++
      }

      const result = this.set(name, value)
      if (result.kind === "rejected") throw SetValueError.rejected(name, value, result.reason)

      this.commandLine.add(name)
    }

    return []
  }

  private defineTyped<T>(
    name: string,
    kind: FlagKind,
    defaultValue: string,
    usage: string,
    schema: z.ZodType<T, string>,
  ): FlagHandle<T> {
    this.define({ name, kind, defaultValue, usage })

    return {
      name,
      get: () => schema.parse(this.flags.get(name)?.value ?? defaultValue),
    }
  }
}

function canonicalize(kind: FlagKind, raw: string): SetResult {
  const result = flagSchemas[kind].safeParse(raw)

  if (!result.success) return { kind: "rejected", reason: z.prettifyError(result.error) }

  return { kind: "accepted", value: String(result.data) }
}

function toView({ definition, value }: FlagEntry): FlagView {
  return {
    name: definition.name,
    value,
    defaultValue: definition.defaultValue,
    usage: definition.usage,
    isBoolean: definition.kind === "boolean",
  }
}
