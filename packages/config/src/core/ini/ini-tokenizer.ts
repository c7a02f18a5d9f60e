import type { Directive } from "../../ports/directive"
import { IniSyntaxError } from "../errors"
import type { SourceLine } from "./line-decoder"
import { parseValue } from "./quoting"

export type IniToken =
  | { kind: "directive"; directive: Directive }
  | { kind: "import"; path: string; lineNumber: number }

const IMPORT_PREFIX = "#import "

/**
 * Turns decoded lines into directives and import requests.
 *
 * Keys ending in `{delim}` are joined across lines: `m{,}=a` then `m{,}=b`
 * yields one `m = a,b` directive, emitted when a different key, an import
 * or the end of the source is reached.
 */
export function* tokenizeIni(
  lines: Iterable<SourceLine>,
  sourceId: string,
): Generator<IniToken> {
  let pendingComment = ""
  let multiline: Directive | undefined

  for (const { text, lineNumber } of lines) {
    const line = text.trim()
    const at = { source: sourceId, line: lineNumber }

    if (line.startsWith(IMPORT_PREFIX)) {
      const { value } = parseValue(line.slice(IMPORT_PREFIX.length), at)

      if (multiline) {
        yield { kind: "directive", directive: multiline }
        multiline = undefined
      }

      yield { kind: "import", path: value, lineNumber }
      continue
    }

    if (line === "" || line.startsWith("[")) {
      pendingComment = ""
      continue
    }

    if (line.startsWith("#") || line.startsWith(";")) {
      pendingComment = line.slice(1)
      continue
    }

    const eq = line.indexOf("=")
    if (eq === -1) throw IniSyntaxError.unsplittable(line, at)

    const key = line.slice(0, eq).trim()
    const parsed = parseValue(line.slice(eq + 1), at)
    const comment = pendingComment === "" ? parsed.comment : pendingComment

    pendingComment = ""

    const directive: Directive = Object.freeze({
      key,
      value: parsed.value,
      sourcePath: sourceId,
      lineNumber,
      comment,
    })

    if (!key.endsWith("}")) {
      if (multiline) {
        yield { kind: "directive", directive: multiline }
        multiline = undefined
      }

      yield { kind: "directive", directive }
      continue
    }

    const open = key.lastIndexOf("{")
    if (open === -1) throw IniSyntaxError.malformedMultilineKey(key, at)

    const base = key.slice(0, open)

    if (multiline?.key === base) {
      const delimiter = key.slice(open + 1, -1)
      multiline = Object.freeze({ ...multiline, value: multiline.value + delimiter + parsed.value })
      continue
    }

    if (multiline) yield { kind: "directive", directive: multiline }

    multiline = Object.freeze({ ...directive, key: base })
  }

  if (multiline) yield { kind: "directive", directive: multiline }
}
