import type { Seconds } from "@stowage/clock"
import type { Bytes } from "./storage-object"

export interface GetOptions {
  /** Read at most this many leading bytes. */
  byteCount?: Bytes
}

export interface PutOptions {
  contentType?: string
  metadata?: Record<string, string>
}

export interface ListOptions {
  /** Only keys starting with this prefix */
  prefix?: string

  /** Max objects per page */
  maxKeys?: number

  /** Opaque token from a previous ListResult */
  cursor?: string
}

export interface PresignedUrlOptions {
  expiresInSeconds?: Seconds
}

export interface CopyOptions {
  /** Replace the destination's metadata instead of copying the source's. */
  metadata?: Record<string, string>
}
