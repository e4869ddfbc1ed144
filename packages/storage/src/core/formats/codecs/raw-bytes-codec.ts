import { DataError } from "../../../model/data.errors"
import type { FormatCodec } from "./format-codec"

export const rawBytesCodec: FormatCodec<Uint8Array> = {
  format: "raw-bytes",
  contentType: "application/octet-stream",

  accepts(value: unknown): value is Uint8Array {
    return value instanceof Uint8Array
  },

  encode(value) {
    if (!rawBytesCodec.accepts(value)) {
      throw DataError.encodeError("raw-bytes", "value must be a Uint8Array")
    }
    return value
  },

  decode(bytes) {
    return bytes
  },
}
