import { DataError } from "../../../model/data.errors"
import type { JsonValue } from "../format"
import type { FormatCodec } from "./format-codec"
import { decodeUtf8, encodeUtf8, jsonErrorPosition, stripBom } from "./utf8"

export const jsonObjectCodec: FormatCodec<JsonValue> = {
  format: "json-object",
  contentType: "application/json",

  accepts(value: unknown): value is JsonValue {
    return isJsonValue(value)
  },

  encode(value) {
    if (!isJsonValue(value)) {
      throw DataError.encodeError("json-object", "value is not JSON-serializable")
    }
    return encodeUtf8(JSON.stringify(value))
  },

  decode(bytes) {
    const text = stripBom(decodeUtf8(bytes, "json-object"))

    try {
      return parseJson(text)
    } catch (err) {
      const position = jsonErrorPosition(err)
      const message = err instanceof Error ? err.message : "invalid JSON"

      throw DataError.decodeError("json-object", message, {
        cause: err,
        ...(position !== undefined && { position }),
      })
    }
  },
}

export function parseJson(text: string): JsonValue {
  const parsed: unknown = JSON.parse(text)

  if (!isJsonValue(parsed)) {
    throw new SyntaxError("Unexpected non-JSON value")
  }

  return parsed
}

/**
 * Structural check for values `JSON.stringify` round-trips: finite numbers,
 * arrays, and plain objects without cycles.
 */
export function isJsonValue(value: unknown, seen: Set<object> = new Set()): value is JsonValue {
  if (value === null) return true
  if (typeof value === "string" || typeof value === "boolean") return true
  if (typeof value === "number") return Number.isFinite(value)
  if (typeof value !== "object") return false

  if (seen.has(value)) return false
  seen.add(value)

  const ok = Array.isArray(value)
    ? value.every((item) => isJsonValue(item, seen))
    : isPlainObject(value) && Object.values(value).every((item) => isJsonValue(item, seen))

  seen.delete(value)
  return ok
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
