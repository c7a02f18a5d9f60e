import { TextDecoder } from "node:util"
import { EncodingError } from "../errors"

export type SourceLine = {
  text: string
  lineNumber: number
}

const NEWLINE = 0x0a
const CARRIAGE_RETURN = 0x0d

// U+FEFF, and U+FFFE written as the three bytes EF BF BE.
const BYTE_ORDER_MARKS = ["\uFEFF", "\uFFFE"]

/**
 * Splits `bytes` into UTF-8 lines, lazily.
 *
 * A line that is not valid UTF-8 throws `EncodingError` when iteration
 * reaches it, so earlier lines are still yielded.
 */
export function* decodeLines(bytes: Uint8Array, sourceId: string): Generator<SourceLine> {
  const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

  let start = 0
  let lineNumber = 0

  while (start < bytes.length) {
    lineNumber++

    const newline = bytes.indexOf(NEWLINE, start)
    const end = newline === -1 ? bytes.length : newline
    const contentEnd = end > start && bytes[end - 1] === CARRIAGE_RETURN ? end - 1 : end

    let text = decodeLine(decoder, bytes.subarray(start, contentEnd), sourceId, lineNumber)
    if (lineNumber === 1) text = stripByteOrderMark(text)

    yield { text, lineNumber }

    start = end + 1
  }
}

function decodeLine(
  decoder: TextDecoder,
  chunk: Uint8Array,
  source: string,
  line: number,
): string {
  try {
    return decoder.decode(chunk)
  } catch (err) {
    throw EncodingError.invalidUtf8({ source, line }, err)
  }
}

function stripByteOrderMark(text: string): string {
  for (const mark of BYTE_ORDER_MARKS) {
    if (text.startsWith(mark)) return text.slice(mark.length)
  }

  return text
}
