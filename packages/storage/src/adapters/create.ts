import type { S3Client } from "@aws-sdk/client-s3"
import { type Clock, SystemClock } from "@stowage/clock"
import type { StoragePort } from "../ports/storage"
import { MemoryStorage } from "./memory-storage"
import { S3Storage } from "./s3-storage"

export interface CreateMemoryStorageOptions {
  clock?: Clock
}

export function createMemoryStorage(options: CreateMemoryStorageOptions = {}): StoragePort {
  return new MemoryStorage({ clock: options.clock ?? new SystemClock() })
}

export interface CreateS3StorageOptions {
  client: S3Client
  clock?: Clock
}

export function createS3Storage(options: CreateS3StorageOptions): StoragePort {
  return new S3Storage({ client: options.client, clock: options.clock ?? new SystemClock() })
}
