import { IniSyntaxError, type SourcePosition } from "../errors"

export type ParsedValue = {
  value: string
  /** Text after an unescaped `#` or `;`, without the marker. */
  comment: string
}

const COMMENT_MARKERS = new Set(["#", ";"])

const QUOTED_ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  n: "\n",
  "\\": "\\",
}

/**
 * Reads the right-hand side of a directive.
 *
 * Unquoted values run to the first unescaped comment marker; `\#` and `\;`
 * stand for the literal characters. Quoted values decode `\"`, `\n` and `\\`
 * and keep every other backslash sequence as written.
 */
export function parseValue(raw: string, at: SourcePosition): ParsedValue {
  const text = raw.trim()

  if (text === "") return { value: "", comment: "" }
  if (text.startsWith('"')) return parseQuoted(text, at)

  return parseUnquoted(text)
}

function parseUnquoted(text: string): ParsedValue {
  let value = ""

  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i)
    const next = text.charAt(i + 1)

    if (ch === "\\" && COMMENT_MARKERS.has(next)) {
      value += next
      i++
      continue
    }

    if (COMMENT_MARKERS.has(ch)) {
      return { value: value.trim(), comment: text.slice(i + 1) }
    }

    value += ch
  }

  return { value, comment: "" }
}

function parseQuoted(text: string, at: SourcePosition): ParsedValue {
  let value = ""

  for (let i = 1; i < text.length; i++) {
    const ch = text.charAt(i)

    if (ch === "\\") {
      const decoded = QUOTED_ESCAPES[text.charAt(i + 1)]

      if (decoded === undefined) {
        value += ch
        continue
      }

      value += decoded
      i++
      continue
    }

    if (ch === '"') {
      return { value, comment: trailingComment(text.slice(i + 1)) }
    }

    value += ch
  }

  throw IniSyntaxError.unterminatedQuote(text, at)
}

function trailingComment(rest: string): string {
  const trimmed = rest.trim()

  return COMMENT_MARKERS.has(trimmed.charAt(0)) ? trimmed.slice(1) : ""
}
