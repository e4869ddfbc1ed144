import { S3Client, type S3ClientConfig } from "@aws-sdk/client-s3"
import type { Clock } from "@stowage/clock"
import type { Logger } from "@stowage/logger"
import { createS3Storage } from "../../adapters/create"
import { DataStore } from "../data-store/data-store"

export interface SessionCredentials {
  accessKeyId: string
  secretAccessKey: string
  sessionToken?: string
}

/**
 * Connection settings shared by every client a façade creates. Anything
 * left unset falls through to the SDK's own resolution (environment,
 * shared config files, instance metadata).
 */
export interface SessionOptions {
  region?: string
  /** Custom endpoint, e.g. a local S3-compatible server. */
  endpoint?: string
  /** Named profile from the shared credentials file. */
  profile?: string
  credentials?: SessionCredentials
  forcePathStyle?: boolean
}

export function s3ClientConfig(session: SessionOptions): S3ClientConfig {
  return {
    ...(session.region && { region: session.region }),
    ...(session.endpoint && { endpoint: session.endpoint }),
    ...(session.profile && { profile: session.profile }),
    ...(session.credentials && { credentials: session.credentials }),
    ...(session.forcePathStyle !== undefined && { forcePathStyle: session.forcePathStyle }),
  }
}

export function createS3Client(session: SessionOptions = {}): S3Client {
  return new S3Client(s3ClientConfig(session))
}

export interface CreateDataStoreOptions {
  session?: SessionOptions
  /** Reuse an existing client instead of building one from `session`. */
  client?: S3Client
  clock?: Clock
  logger?: Logger
}

export function createDataStore(options: CreateDataStoreOptions = {}): DataStore {
  const storage = createS3Storage({
    client: options.client ?? createS3Client(options.session),
    ...(options.clock && { clock: options.clock }),
  })

  return new DataStore({
    storage,
    ...(options.logger && { logger: options.logger }),
  })
}
