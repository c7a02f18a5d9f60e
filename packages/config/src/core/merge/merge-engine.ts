import type { Logger } from "@flagini/logger"
import type { ChangeSet, Directive } from "../../ports/directive"
import type { FlagRegistry, FlagView } from "../../ports/flag-registry"
import { SetValueError, UnknownFlagError } from "../errors"

export type MergeEngineDeps = {
  registry: FlagRegistry
  shorthands: { resolve(alias: string): string | undefined }
  logger: Logger
}

export type PlanOptions = {
  /** Flags given on the command line. Config never overrides these. */
  commandLineFlags: ReadonlySet<string>
  allowUnknownFlags: boolean
}

export type StagedValue = Readonly<{
  flag: string
  /** Canonical form as reported by the registry. */
  value: string
  directive: Directive
}>

export type MergePlan = Readonly<{
  staged: ReadonlyMap<string, StagedValue>
}>

/**
 * Applies config directives to the flag registry in two steps.
 *
 * `plan` checks every directive without writing anything. `commit` writes
 * the plan and undoes its own writes if the registry refuses one.
 */
export class MergeEngine {
  constructor(private readonly deps: MergeEngineDeps) {}

  plan(directives: readonly Directive[], options: PlanOptions): MergePlan {
    const staged = new Map<string, StagedValue>()
    const issues: Error[] = []

    for (const directive of directives) {
      const at = { source: directive.sourcePath, line: directive.lineNumber }
      const flag = this.resolveFlag(directive.key)

      if (!flag) {
        this.deps.logger.warn("Unknown flag in config", { flag: directive.key, ...at })

        if (!options.allowUnknownFlags) {
          issues.push(UnknownFlagError.inDirective(directive.key, at))
        }
        continue
      }

      if (options.commandLineFlags.has(flag.name)) continue

      const current = staged.get(flag.name)?.value ?? flag.value

      if (directive.value === current) {
        staged.set(flag.name, { flag: flag.name, value: current, directive })
        continue
      }

      const result = this.deps.registry.validate(flag.name, directive.value)

      if (result.kind === "rejected") {
        const err = SetValueError.rejected(flag.name, directive.value, result.reason, at)

        this.deps.logger.warn("Invalid flag value in config", { flag: flag.name, ...at, err })
        issues.push(err)
        continue
      }

      staged.set(flag.name, { flag: flag.name, value: result.value, directive })
    }

    const [first] = issues
    if (first) throw first

    return { staged }
  }

  /**
   * Writes `plan` into the registry.
   *
   * @returns the flags whose value changed, mapped to their previous value
   * @throws SetValueError when the registry refuses a write; earlier writes
   *   from the same call are restored first
   */
  commit(plan: MergePlan): ChangeSet {
    const previous = new Map<string, string>()

    for (const { flag, value, directive } of plan.staged.values()) {
      const live = this.deps.registry.lookup(flag)?.value

      if (live === undefined || live === value) continue

      const result = this.deps.registry.set(flag, value)

      if (result.kind === "rejected") {
        this.restore(previous)

        throw SetValueError.rejected(flag, value, result.reason, {
          source: directive.sourcePath,
          line: directive.lineNumber,
        })
      }

      previous.set(flag, live)
    }

    const changes = new Map<string, string>()

    for (const [flag, before] of previous) {
      if (this.deps.registry.lookup(flag)?.value !== before) changes.set(flag, before)
    }

    return changes
  }

  private resolveFlag(key: string): FlagView | undefined {
    const direct = this.deps.registry.lookup(key)
    if (direct) return direct

    const fullName = this.deps.shorthands.resolve(key)

    return fullName === undefined ? undefined : this.deps.registry.lookup(fullName)
  }

  private restore(previous: ReadonlyMap<string, string>): void {
    for (const [flag, value] of previous) {
      const result = this.deps.registry.set(flag, value)

      if (result.kind === "rejected") {
        this.deps.logger.error("Failed to restore flag value", {
          flag,
          value,
          reason: result.reason,
        })
      }
    }
  }
}
