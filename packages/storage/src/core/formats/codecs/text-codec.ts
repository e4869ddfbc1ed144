import { DataError } from "../../../model/data.errors"
import type { FormatCodec } from "./format-codec"
import { decodeUtf8, encodeUtf8 } from "./utf8"

export const textCodec: FormatCodec<string> = {
  format: "text",
  contentType: "text/plain; charset=utf-8",

  accepts(value: unknown): value is string {
    return typeof value === "string"
  },

  encode(value) {
    if (!textCodec.accepts(value)) {
      throw DataError.encodeError("text", `expected a string, got ${typeof value}`)
    }
    return encodeUtf8(value)
  },

  decode(bytes) {
    return decodeUtf8(bytes, "text")
  },
}
