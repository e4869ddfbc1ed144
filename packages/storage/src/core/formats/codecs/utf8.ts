import { DataError } from "../../../model/data.errors"
import type { Format } from "../format"

const encoder = new TextEncoder()
// A leading U+FEFF is kept: text and rows decode to exactly what was encoded
const decoder = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true })

export function encodeUtf8(text: string): Uint8Array {
  return encoder.encode(text)
}

export function decodeUtf8(bytes: Uint8Array, format: Format): string {
  try {
    return decoder.decode(bytes)
  } catch (err) {
    throw DataError.decodeError(format, "payload is not valid UTF-8", { cause: err })
  }
}

/** JSON payloads tolerate a byte order mark written by other tools. */
export function stripBom(text: string): string {
  return text.startsWith("\uFEFF") ? text.slice(1) : text
}

const POSITION_PATTERN = /at position (\d+)/

/** Offset reported by a JSON.parse SyntaxError, when the engine includes one. */
export function jsonErrorPosition(err: unknown): number | undefined {
  if (!(err instanceof Error)) return undefined

  const match = POSITION_PATTERN.exec(err.message)
  return match?.[1] !== undefined ? Number(match[1]) : undefined
}
