import { DataError } from "../../model/data.errors"
import type { ObjectRef, StorageBucket, StorageKey } from "../../ports/storage-object"

/** Either an `s3://bucket/key` URI or an explicit bucket/key pair, never both. */
export type LocationInput =
  | string
  | {
      uri?: string
      bucket?: StorageBucket
      key?: StorageKey
    }

export interface ResolveOptions {
  /** Listing passes `false` to allow an empty key (a bucket-wide prefix). Default: true */
  requireKey?: boolean
}

const URI_PATTERN = /^s3:\/\/([^/]+)(?:\/(.*))?$/is
// Same check as a bucket given directly, so both addressing modes agree
const BUCKET_PATTERN = /^[a-z0-9.-]+$/
const BUCKET_REASON = "bucket must be lowercase letters, digits, dots or hyphens"

export function resolveLocation(input: LocationInput, options?: ResolveOptions): ObjectRef {
  const requireKey = options?.requireKey ?? true
  const { uri, bucket, key } = typeof input === "string" ? { uri: input } : input

  const hasPair = bucket !== undefined || key !== undefined

  if (uri !== undefined && hasPair) {
    throw DataError.invalidLocation("give either a uri or a bucket/key pair, not both", {
      uri,
      bucket,
      key,
    })
  }

  if (uri === undefined && !hasPair) {
    throw DataError.invalidLocation("no uri or bucket/key pair given")
  }

  const ref = uri !== undefined ? parseUri(uri) : { bucket: bucket ?? "", key: key ?? "" }

  if (!ref.bucket) {
    throw DataError.invalidLocation("bucket is empty", { bucket, key })
  }

  if (!BUCKET_PATTERN.test(ref.bucket)) {
    throw DataError.invalidLocation(BUCKET_REASON, { bucket: ref.bucket })
  }

  if (requireKey && !ref.key) {
    throw DataError.invalidLocation("key is empty", { bucket: ref.bucket, ...(uri && { uri }) })
  }

  return ref
}

/**
 * Split an `s3://` URI into bucket and key. The scheme is matched
 * case-insensitively; the key is kept verbatim and may be empty.
 */
export function parseUri(uri: string): ObjectRef {
  const match = URI_PATTERN.exec(uri.trim())

  if (!match) {
    const reason =
      !/^s3:\/\//i.test(uri) && /^[a-z][a-z0-9+.-]*:\/\//i.test(uri)
        ? "unsupported scheme, expected s3://"
        : "not an s3://bucket/key uri"

    throw DataError.invalidLocation(reason, { uri })
  }

  const bucket = match[1] ?? ""
  if (!BUCKET_PATTERN.test(bucket)) {
    throw DataError.invalidLocation(BUCKET_REASON, { uri })
  }

  return { bucket, key: match[2] ?? "" }
}

export function formatUri(ref: ObjectRef): string {
  return `s3://${ref.bucket}/${ref.key}`
}

/**
 * `joinUri("data", "/exports/", "/2024/users.csv")` is
 * `s3://data/exports/2024/users.csv`.
 */
export function joinUri(bucket: StorageBucket, ...parts: string[]): string {
  const key = parts
    .map((part) => part.replace(/^\/+/, "").replace(/\/+$/, ""))
    .filter((part) => part.length > 0)
    .join("/")

  return formatUri({ bucket, key })
}

/** Last path segment of a key or URI. */
export function basename(keyOrUri: string): string {
  const path = keyOrUri.replace(/^s3:\/\/[^/]*\/?/i, "")
  const segments = path.split("/")

  return segments[segments.length - 1] ?? ""
}

/**
 * `[stem, extension]` of the last path segment; the extension keeps its dot.
 * Leading-dot names such as `.env` have no extension.
 */
export function splitExtension(keyOrUri: string): [string, string] {
  const name = basename(keyOrUri)
  const dot = name.lastIndexOf(".")

  if (dot <= 0) return [keyOrUri, ""]

  const extLength = name.length - dot
  return [keyOrUri.slice(0, keyOrUri.length - extLength), name.slice(dot)]
}

/**
 * Public HTTPS URL of an object. Virtual-hosted style, except for buckets
 * containing a dot, which break TLS wildcard certificates.
 */
export function objectUrl(ref: ObjectRef, region?: string): URL {
  const host = region ? `s3.${region}.amazonaws.com` : "s3.amazonaws.com"
  const key = ref.key.split("/").map(encodeURIComponent).join("/")

  if (ref.bucket.includes(".")) {
    return new URL(`https://${host}/${ref.bucket}/${key}`)
  }

  return new URL(`https://${ref.bucket}.${host}/${key}`)
}
