import { DataError } from "../../../model/data.errors"
import type { ImageMediaType, ImageObject } from "../format"
import type { FormatCodec } from "./format-codec"

type Signature = {
  mediaType: ImageMediaType
  /** Byte patterns keyed by their offset from the start of the payload */
  parts: Array<[offset: number, bytes: number[]]>
}

const SIGNATURES: Signature[] = [
  { mediaType: "image/png", parts: [[0, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]]] },
  { mediaType: "image/jpeg", parts: [[0, [0xff, 0xd8, 0xff]]] },
  { mediaType: "image/gif", parts: [[0, [0x47, 0x49, 0x46, 0x38]]] },
  {
    mediaType: "image/webp",
    parts: [
      [0, [0x52, 0x49, 0x46, 0x46]],
      [8, [0x57, 0x45, 0x42, 0x50]],
    ],
  },
  { mediaType: "image/bmp", parts: [[0, [0x42, 0x4d]]] },
  { mediaType: "image/tiff", parts: [[0, [0x49, 0x49, 0x2a, 0x00]]] },
  { mediaType: "image/tiff", parts: [[0, [0x4d, 0x4d, 0x00, 0x2a]]] },
]

export function sniffImageType(bytes: Uint8Array): ImageMediaType | undefined {
  return SIGNATURES.find(({ parts }) =>
    parts.every(([offset, sig]) => sig.every((b, i) => bytes[offset + i] === b)),
  )?.mediaType
}

export const binaryImageCodec: FormatCodec<ImageObject> = {
  format: "binary-image",
  contentType: "application/octet-stream",

  accepts(value: unknown): value is ImageObject {
    return (
      typeof value === "object" &&
      value !== null &&
      "data" in value &&
      value.data instanceof Uint8Array
    )
  },

  encode(value) {
    if (!binaryImageCodec.accepts(value)) {
      throw DataError.encodeError("binary-image", "value must be { mediaType, data: Uint8Array }")
    }
    return value.data
  },

  decode(bytes) {
    const mediaType = sniffImageType(bytes)

    if (!mediaType) {
      throw DataError.decodeError("binary-image", "unrecognized image signature", {
        position: 0,
      })
    }

    return { mediaType, data: bytes }
  },
}
