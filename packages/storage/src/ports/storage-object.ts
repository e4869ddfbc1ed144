import type { Readable } from "node:stream"

export type StorageData = Readable | Buffer | Uint8Array

export type Bytes = number

/**
 * Identifier of an object within a bucket, path-like by convention
 * ("exports/2024/06/users.jsonl"). Buckets have no real directories.
 */
export type StorageKey = string

/** Bucket name; S3 rules apply (lowercase, digits, dots, hyphens). */
export type StorageBucket = string

/** Resolved address of one object. */
export interface ObjectRef {
  bucket: StorageBucket
  key: StorageKey
}

export type StorageObjectMetadata = {
  key: StorageKey
  sizeInBytes: Bytes
  lastModified: Date
  contentType?: string
  etag?: string
  metadata?: Record<string, string>
}

export interface StorageObject extends StorageObjectMetadata {
  body: Buffer
}
