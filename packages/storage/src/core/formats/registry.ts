import { DataError } from "../../model/data.errors"
import { splitExtension } from "../location/location"
import { binaryImageCodec } from "./codecs/binary-image-codec"
import { delimitedRowsCodec } from "./codecs/delimited-rows-codec"
import type { FormatCodec } from "./codecs/format-codec"
import { jsonLinesCodec } from "./codecs/json-lines-codec"
import { jsonObjectCodec } from "./codecs/json-object-codec"
import { rawBytesCodec } from "./codecs/raw-bytes-codec"
import { textCodec } from "./codecs/text-codec"
import { type DataValue, type Format, type FormatValues, isFormat } from "./format"

type CodecTable = { [F in Format]: FormatCodec<FormatValues[F]> }

const CODECS: CodecTable = {
  "raw-bytes": rawBytesCodec,
  text: textCodec,
  "json-object": jsonObjectCodec,
  "json-lines": jsonLinesCodec,
  "delimited-rows": delimitedRowsCodec,
  "binary-image": binaryImageCodec,
}

const FORMAT_BY_EXTENSION: Record<string, Format> = {
  ".json": "json-object",
  ".jsonl": "json-lines",
  ".ndjson": "json-lines",
  ".txt": "text",
  ".md": "text",
  ".log": "text",
  ".html": "text",
  ".xml": "text",
  ".yaml": "text",
  ".yml": "text",
  ".csv": "delimited-rows",
  ".tsv": "delimited-rows",
  ".lines": "delimited-rows",
  ".png": "binary-image",
  ".jpg": "binary-image",
  ".jpeg": "binary-image",
  ".gif": "binary-image",
  ".webp": "binary-image",
  ".bmp": "binary-image",
  ".tif": "binary-image",
  ".tiff": "binary-image",
}

const CONTENT_TYPE_BY_EXTENSION: Record<string, string> = {
  ".json": "application/json",
  ".jsonl": "application/x-jsonlines",
  ".ndjson": "application/x-ndjson",
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".log": "text/plain",
  ".html": "text/html",
  ".xml": "application/xml",
  ".yaml": "application/yaml",
  ".yml": "application/yaml",
  ".csv": "text/csv",
  ".tsv": "text/tab-separated-values",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".bmp": "image/bmp",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
  ".gz": "application/gzip",
  ".zip": "application/zip",
  ".pdf": "application/pdf",
}

export interface CodecSelection {
  format: Format
  codec: FormatCodec<DataValue>
  contentType: string
}

export function getCodec<F extends Format>(format: F): FormatCodec<FormatValues[F]> {
  return CODECS[format]
}

/**
 * Format implied by a key's suffix (case-insensitive). Keys without a
 * suffix are text; unknown suffixes are raw bytes.
 */
export function inferFormat(key: string): Format {
  const [, ext] = splitExtension(key)
  if (ext === "") return "text"

  return FORMAT_BY_EXTENSION[ext.toLowerCase()] ?? "raw-bytes"
}

export function resolveFormat(format: string | undefined, key: string): Format {
  if (format === undefined) return inferFormat(key)
  if (!isFormat(format)) throw DataError.unsupportedFormat(format)

  return format
}

/** Content type registered for the key's suffix, if any. */
export function contentTypeForKey(key: string): string | undefined {
  const [, ext] = splitExtension(key)
  return CONTENT_TYPE_BY_EXTENSION[ext.toLowerCase()]
}

/**
 * Codec for an explicit format tag, or for the format inferred from `key`.
 * Same inputs always select the same codec.
 */
export function codecFor(format: string | undefined, key: string): CodecSelection {
  const resolved = resolveFormat(format, key)
  const codec: FormatCodec<DataValue> = CODECS[resolved]

  return {
    format: resolved,
    codec,
    contentType: contentTypeForKey(key) ?? codec.contentType,
  }
}

/**
 * Content type for a written object: the key's suffix wins, then the sniffed
 * media type of an image, then the codec default.
 */
export function contentTypeFor(selection: CodecSelection, key: string, value: unknown): string {
  const fromKey = contentTypeForKey(key)
  if (fromKey) return fromKey

  if (selection.format === "binary-image" && binaryImageCodec.accepts(value)) {
    return value.mediaType
  }

  return selection.codec.contentType
}
