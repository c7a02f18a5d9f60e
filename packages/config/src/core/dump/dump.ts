import type { FlagView } from "../../ports/flag-registry"

// Characters dropped from usage text so it stays a single-line INI comment.
const USAGE_STRIPPED = [
  "\t",
  "\v",
  "\f",
  "\b",
  "\x07",
  "\\",
  '"',
  "²",
  "³",
  "¹",
  "⁰",
  "⁴",
  "⁵",
  "⁶",
  "⁷",
  "⁸",
  "⁹",
]

/** Quotes `value` when it would not survive a plain `key = value` line. */
export function quoteValue(value: string): string {
  const needsQuotes =
    /[\n#;]/.test(value) || value.trim() !== value || value.startsWith('"')

  if (!needsQuotes) return value

  const escaped = value.replaceAll("\\", "\\\\").replaceAll("\n", "\\n").replaceAll('"', '\\"')

  return `"${escaped}"`
}

export function escapeUsage(usage: string): string {
  let out = usage.replaceAll("\n", "\n    # ")

  for (const ch of USAGE_STRIPPED) out = out.replaceAll(ch, "")

  return out
}

/**
 * Renders flags as INI text that `IniParser` reads back to the same values.
 */
export function dumpFlags(flags: readonly FlagView[], exclude: ReadonlySet<string>): string {
  return [...flags]
    .filter((flag) => !exclude.has(flag.name))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .map((flag) => `${flag.name} = ${quoteValue(flag.value)}  # ${escapeUsage(flag.usage)}\n`)
    .join("")
}
