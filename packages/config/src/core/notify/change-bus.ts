import type { Logger } from "@flagini/logger"
import type { ChangeSet } from "../../ports/directive"
import type { FlagRegistry } from "../../ports/flag-registry"
import { RegistrationError } from "../errors"

export type FlagChange = Readonly<{
  name: string
  value: string
  /** Value before the change. On the first notification this equals `value`. */
  previousValue: string
}>

export type FlagChangeCallback = (change: FlagChange) => void

export type ChangeBusDeps = {
  registry: Pick<FlagRegistry, "lookup">
  logger: Logger
}

export class ChangeBus {
  private readonly callbacks = new Map<string, FlagChangeCallback[]>()
  private strict = false

  constructor(private readonly deps: ChangeBusDeps) {}

  /**
   * Registers `callback` for `flagName`.
   *
   * Before `verify()` has run any name is accepted; afterwards an unknown name
   * throws `RegistrationError`.
   */
  subscribe(flagName: string, callback: FlagChangeCallback): void {
    if (this.strict) this.assertKnown(flagName)

    this.callbacks.set(flagName, [...(this.callbacks.get(flagName) ?? []), callback])
  }

  /** Switches to checking on subscribe, then checks every name registered so far. */
  verify(): void {
    this.strict = true

    for (const flagName of this.callbacks.keys()) this.assertKnown(flagName)
  }

  emitAll(): void {
    for (const flagName of this.callbacks.keys()) {
      const value = this.deps.registry.lookup(flagName)?.value ?? ""

      this.emit({ name: flagName, value, previousValue: value })
    }
  }

  emitChanges(changeSet: ChangeSet): void {
    for (const [flagName, previousValue] of changeSet) {
      const value = this.deps.registry.lookup(flagName)?.value ?? ""

      this.emit({ name: flagName, value, previousValue })
    }
  }

  private emit(change: FlagChange): void {
    for (const callback of this.callbacks.get(change.name) ?? []) {
      try {
        callback(change)
      } catch (err) {
        this.deps.logger.error("Flag change callback failed", { flag: change.name, err })
      }
    }
  }

  private assertKnown(flagName: string): void {
    if (!this.deps.registry.lookup(flagName)) {
      throw RegistrationError.unknownFlag("onFlagChange", flagName)
    }
  }
}
