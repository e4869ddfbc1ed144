import { DataError } from "../../../model/data.errors"
import type { JsonValue } from "../format"
import type { FormatCodec } from "./format-codec"
import { isJsonValue, parseJson } from "./json-object-codec"
import { decodeUtf8, encodeUtf8, jsonErrorPosition, stripBom } from "./utf8"

/**
 * Records of a JSON-lines payload. Lines are parsed on iteration, so a
 * malformed line surfaces only when reached; iterating again starts over.
 */
class JsonLinesRecords implements Iterable<JsonValue> {
  constructor(private readonly text: string) {}

  *[Symbol.iterator](): Iterator<JsonValue> {
    const lines = this.text.split(/\r?\n/)

    for (const [index, line] of lines.entries()) {
      if (line.trim() === "") continue

      yield parseLine(line, index + 1)
    }
  }
}

function parseLine(line: string, lineNumber: number): JsonValue {
  try {
    return parseJson(line)
  } catch (err) {
    const position = jsonErrorPosition(err)
    const message = err instanceof Error ? err.message : "invalid JSON"

    throw DataError.decodeError("json-lines", message, {
      line: lineNumber,
      cause: err,
      ...(position !== undefined && { position }),
    })
  }
}

export const jsonLinesCodec: FormatCodec<Iterable<JsonValue>> = {
  format: "json-lines",
  contentType: "application/x-ndjson",

  accepts(value: unknown): value is Iterable<JsonValue> {
    return isIterable(value)
  },

  encode(value) {
    if (!jsonLinesCodec.accepts(value)) {
      throw DataError.encodeError("json-lines", "value must be an iterable of records")
    }

    let out = ""
    let index = 0

    for (const record of value) {
      if (!isJsonValue(record)) {
        throw DataError.encodeError("json-lines", "record is not JSON-serializable", { index })
      }
      out += `${JSON.stringify(record)}\n`
      index++
    }

    return encodeUtf8(out)
  },

  decode(bytes) {
    return new JsonLinesRecords(stripBom(decodeUtf8(bytes, "json-lines")))
  },
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === "object" && value !== null && Symbol.iterator in value
}
