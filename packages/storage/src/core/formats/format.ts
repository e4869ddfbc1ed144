export const formats = [
  "raw-bytes",
  "text",
  "json-object",
  "json-lines",
  "delimited-rows",
  "binary-image",
] as const

export type Format = (typeof formats)[number]

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

export type ImageMediaType =
  | "image/png"
  | "image/jpeg"
  | "image/gif"
  | "image/webp"
  | "image/bmp"
  | "image/tiff"

export interface ImageObject {
  mediaType: ImageMediaType
  data: Uint8Array
}

/** Decoded value type per format. */
export interface FormatValues {
  "raw-bytes": Uint8Array
  text: string
  "json-object": JsonValue
  "json-lines": Iterable<JsonValue>
  "delimited-rows": string[]
  "binary-image": ImageObject
}

export type DataValue = FormatValues[Format]

export function isFormat(value: string): value is Format {
  return formats.some((format) => format === value)
}
