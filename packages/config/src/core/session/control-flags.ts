import { z } from "zod"
import type { FlagDefinition, FlagRegistry } from "../../ports/flag-registry"

/** Registry names of the flags that steer the session itself. */
export type ControlFlagNames = {
  config: string
  allowUnknownFlags: string
  allowMissingConfig: string
  configUpdateIntervalMs: string
  dumpflags: string
  unsecure: string
}

export const defaultControlFlagNames: ControlFlagNames = {
  config: "config",
  allowUnknownFlags: "allowUnknownFlags",
  allowMissingConfig: "allowMissingConfig",
  configUpdateIntervalMs: "configUpdateIntervalMs",
  dumpflags: "dumpflags",
  unsecure: "unsecure",
}

const flagBoolean = z.stringbool()

export const controlSettingsSchema = z.object({
  configPath: z.string(),
  allowUnknownFlags: flagBoolean,
  allowMissingConfig: flagBoolean,
  configUpdateIntervalMs: z.string().transform(Number).pipe(z.int()),
  dumpFlags: flagBoolean,
  allowUnsecure: flagBoolean,
})

export type ControlSettings = z.output<typeof controlSettingsSchema>

export function controlFlagDefinitions(names: ControlFlagNames): FlagDefinition[] {
  return [
    {
      name: names.config,
      kind: "string",
      defaultValue: "",
      usage: "Path to ini config. May be relative to the current executable path.",
    },
    {
      name: names.allowUnknownFlags,
      kind: "boolean",
      defaultValue: "false",
      usage: "Don't terminate the application if the ini file contains unknown flags.",
    },
    {
      name: names.allowMissingConfig,
      kind: "boolean",
      defaultValue: "false",
      usage: "Don't terminate the application if the ini file cannot be read.",
    },
    {
      name: names.configUpdateIntervalMs,
      kind: "integer",
      defaultValue: "0",
      usage:
        "Update interval in milliseconds for re-reading the config file set via -config. Zero disables re-reading.",
    },
    {
      name: names.dumpflags,
      kind: "boolean",
      defaultValue: "false",
      usage: "Dumps values for all flags in ini-compatible syntax to stdout and exits.",
    },
    {
      name: names.unsecure,
      kind: "boolean",
      defaultValue: "false",
      usage: "Allow loading the config file over plain http.",
    },
  ]
}

/**
 * Reads the current control settings from the registry.
 *
 * @throws Error when a control flag is missing or holds a value of the wrong shape
 */
export function readControlSettings(
  registry: Pick<FlagRegistry, "lookup">,
  names: ControlFlagNames,
): ControlSettings {
  const result = controlSettingsSchema.safeParse({
    configPath: registry.lookup(names.config)?.value,
    allowUnknownFlags: registry.lookup(names.allowUnknownFlags)?.value,
    allowMissingConfig: registry.lookup(names.allowMissingConfig)?.value,
    configUpdateIntervalMs: registry.lookup(names.configUpdateIntervalMs)?.value,
    dumpFlags: registry.lookup(names.dumpflags)?.value,
    allowUnsecure: registry.lookup(names.unsecure)?.value,
  })

  if (!result.success) {
    throw new Error(`Control flags are invalid:\n${z.prettifyError(result.error)}`)
  }

  return result.data
}
