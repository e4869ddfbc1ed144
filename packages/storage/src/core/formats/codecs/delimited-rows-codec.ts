import { DataError } from "../../../model/data.errors"
import type { FormatCodec } from "./format-codec"
import { decodeUtf8, encodeUtf8 } from "./utf8"

/**
 * Line-oriented rows. Rows are kept as text; splitting into fields is left
 * to the caller since delimiters and quoting vary by producer.
 */
export const delimitedRowsCodec: FormatCodec<string[]> = {
  format: "delimited-rows",
  contentType: "text/plain; charset=utf-8",

  accepts(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((row) => typeof row === "string")
  },

  encode(value) {
    if (!Array.isArray(value)) {
      throw DataError.encodeError("delimited-rows", "value must be an array of strings")
    }

    let out = ""

    for (const [index, row] of value.entries()) {
      if (typeof row !== "string") {
        throw DataError.encodeError("delimited-rows", "row must be a string", { index })
      }
      if (/[\r\n]/.test(row)) {
        throw DataError.encodeError("delimited-rows", "row contains a line break", { index })
      }
      out += `${row}\n`
    }

    return encodeUtf8(out)
  },

  decode(bytes) {
    const text = decodeUtf8(bytes, "delimited-rows")
    if (text === "") return []

    return text.replace(/\r?\n$/, "").split(/\r?\n/)
  },
}
