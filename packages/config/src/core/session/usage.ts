import type { FlagView } from "../../ports/flag-registry"

function defaultSuffix(flag: FlagView): string {
  if (flag.isBoolean) return flag.defaultValue === "true" ? " (default true)" : ""
  if (flag.defaultValue === "" || flag.defaultValue === "0") return ""

  return ` (default ${JSON.stringify(flag.defaultValue)})`
}

/** Lists every flag the way command-line tools print their defaults. */
export function formatFlagUsage(flags: readonly FlagView[]): string {
  return flags
    .map((flag) => {
      const hint = flag.isBoolean ? "" : " value"
      const usage = flag.usage.replaceAll("\n", "\n    \t")

      return `  -${flag.name}${hint}\n    \t${usage}${defaultSuffix(flag)}\n`
    })
    .join("")
}
