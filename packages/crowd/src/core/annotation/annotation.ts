import { deflateSync, inflateSync } from "node:zlib"
import { DataError, type JsonValue } from "@stowage/storage"

/** Longest RequesterAnnotation Mechanical Turk accepts. */
export const MAX_ANNOTATION_LENGTH = 255

const FORMAT = "requester-annotation"

/**
 * Packs caller state into a RequesterAnnotation string.
 *
 * The state is stored as `{"payload": state}` when that fits, otherwise
 * its JSON is deflated and base64-encoded into `{"payloadBytes": "..."}`.
 */
export function packAnnotation(state: JsonValue): string {
  const plain = JSON.stringify({ payload: state })
  if (plain.length <= MAX_ANNOTATION_LENGTH) {
    return plain
  }

  const compressed = JSON.stringify({
    payloadBytes: deflateSync(JSON.stringify(state)).toString("base64"),
  })
  if (compressed.length <= MAX_ANNOTATION_LENGTH) {
    return compressed
  }

  throw DataError.encodeError(
    FORMAT,
    `compressed state is ${compressed.length} characters, limit is ${MAX_ANNOTATION_LENGTH}`,
  )
}

/**
 * Reverses {@link packAnnotation}. Empty text unpacks to `null`; text that
 * is not JSON, or JSON without an envelope, is returned as found.
 */
export function unpackAnnotation(text: string | undefined): JsonValue {
  if (!text) {
    return null
  }

  let envelope: JsonValue
  try {
    envelope = JSON.parse(text)
  } catch {
    return text
  }

  if (typeof envelope !== "object" || envelope === null || Array.isArray(envelope)) {
    return envelope
  }

  if ("payload" in envelope) {
    return envelope.payload ?? null
  }

  const bytes = envelope.payloadBytes
  if (bytes === undefined) {
    return envelope
  }
  if (typeof bytes !== "string") {
    throw DataError.decodeError(FORMAT, "payloadBytes must be a string")
  }

  try {
    return JSON.parse(inflateSync(Buffer.from(bytes, "base64")).toString("utf8"))
  } catch (err) {
    throw DataError.decodeError(FORMAT, "payloadBytes is not compressed JSON", { cause: err })
  }
}
