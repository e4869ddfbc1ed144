import { createHash } from "node:crypto"
import type { Readable } from "node:stream"
import type { Clock } from "@stowage/clock"
import { DataError } from "../model/data.errors"
import type { StoragePort } from "../ports/storage"
import type {
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "../ports/storage-object"
import type {
  CopyOptions,
  GetOptions,
  ListOptions,
  PresignedUrlOptions,
  PutOptions,
} from "../ports/storage-options"
import type { ListResult } from "../ports/storage-result"

const DEFAULT_MAX_KEYS = 1000
const DEFAULT_PRESIGN_EXPIRY_SECONDS = 900

interface StoredObject {
  data: Buffer
  contentType?: string
  metadata?: Record<string, string>
  lastModified: Date
}

export interface MemoryStorageDeps {
  clock: Clock
}

/**
 * In-process object store with S3 listing semantics. Buckets spring into
 * existence on first write.
 */
export class MemoryStorage implements StoragePort {
  private readonly buckets = new Map<StorageBucket, Map<StorageKey, StoredObject>>()

  constructor(private readonly deps: MemoryStorageDeps) {}

  async put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const buffer = await this.toBuffer(data)
    const bucket = this.getOrCreateBucket(ref.bucket)

    bucket.set(ref.key, {
      data: buffer,
      lastModified: this.deps.clock.now(),
      ...(options?.contentType && { contentType: options.contentType }),
      ...(options?.metadata && { metadata: { ...options.metadata } }),
    })
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    const stored = this.getStoredObject(ref)
    if (!stored) return null

    return this.toObjectMetadata(ref.key, stored)
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    return this.getStoredObject(ref) !== undefined
  }

  async get(ref: ObjectRef, options?: GetOptions): Promise<StorageObject | null> {
    const stored = this.getStoredObject(ref)
    if (!stored) return null

    const end = options?.byteCount !== undefined ? Math.max(0, options.byteCount) : undefined
    const body = Buffer.from(stored.data.subarray(0, end))

    return {
      ...this.toObjectMetadata(ref.key, stored),
      sizeInBytes: body.length,
      body,
    }
  }

  async delete(ref: ObjectRef): Promise<void> {
    this.buckets.get(ref.bucket)?.delete(ref.key)
  }

  async list(bucket: StorageBucket, options?: ListOptions): Promise<ListResult> {
    const bucketMap = this.buckets.get(bucket)
    if (!bucketMap) return { objects: [] }

    const prefix = options?.prefix ?? ""
    const maxKeys = options?.maxKeys ?? DEFAULT_MAX_KEYS

    const keys = this.getFilteredSortedKeys(bucketMap, prefix, options?.cursor)
    const page = keys.slice(0, maxKeys)

    const objects: StorageObjectMetadata[] = []
    for (const key of page) {
      const stored = bucketMap.get(key)
      if (stored) objects.push(this.toObjectMetadata(key, stored))
    }

    const last = page[page.length - 1]
    const hasMore = keys.length > maxKeys && last !== undefined

    return {
      objects,
      ...(hasMore && { cursor: last }),
    }
  }

  async copy(src: ObjectRef, dst: ObjectRef, options?: CopyOptions): Promise<void> {
    const stored = this.getStoredObject(src)
    if (!stored) throw DataError.notFound(src)

    const metadata = options?.metadata ?? stored.metadata

    this.getOrCreateBucket(dst.bucket).set(dst.key, {
      data: Buffer.from(stored.data),
      lastModified: this.deps.clock.now(),
      ...(stored.contentType && { contentType: stored.contentType }),
      ...(metadata && { metadata: { ...metadata } }),
    })
  }

  async getPresignedDownloadUrl(ref: ObjectRef, options?: PresignedUrlOptions): Promise<URL> {
    const expiresIn = options?.expiresInSeconds ?? DEFAULT_PRESIGN_EXPIRY_SECONDS
    const expiresAt = this.deps.clock.nowMs() + expiresIn * 1000

    const url = new URL(`memory://${ref.bucket}/`)
    url.pathname = `/${ref.key}`
    url.searchParams.set("expires", String(expiresAt))

    return url
  }

  private getOrCreateBucket(bucket: StorageBucket): Map<StorageKey, StoredObject> {
    let bucketMap = this.buckets.get(bucket)
    if (!bucketMap) {
      bucketMap = new Map()
      this.buckets.set(bucket, bucketMap)
    }
    return bucketMap
  }

  private getStoredObject(ref: ObjectRef): StoredObject | undefined {
    return this.buckets.get(ref.bucket)?.get(ref.key)
  }

  private toObjectMetadata(key: string, stored: StoredObject): StorageObjectMetadata {
    return {
      key,
      sizeInBytes: stored.data.length,
      lastModified: stored.lastModified,
      etag: this.computeEtag(stored.data),
      ...(stored.contentType && { contentType: stored.contentType }),
      ...(stored.metadata && { metadata: { ...stored.metadata } }),
    }
  }

  private getFilteredSortedKeys(
    bucketMap: Map<StorageKey, StoredObject>,
    prefix: string,
    cursor?: string,
  ): string[] {
    const keys = Array.from(bucketMap.keys())
      .filter((key) => key.startsWith(prefix))
      .sort()

    if (!cursor) return keys

    return keys.slice(this.findFirstGreaterThan(keys, cursor))
  }

  private findFirstGreaterThan(sortedKeys: string[], value: string): number {
    let lo = 0
    let hi = sortedKeys.length

    while (lo < hi) {
      const mid = (lo + hi) >> 1

      const midValue = sortedKeys[mid]
      if (midValue === undefined) break

      if (midValue <= value) {
        lo = mid + 1
      } else {
        hi = mid
      }
    }

    return lo
  }

  private async toBuffer(data: StorageData): Promise<Buffer> {
    if (data instanceof Uint8Array) return Buffer.from(data)

    return this.drain(data)
  }

  private async drain(stream: Readable): Promise<Buffer> {
    const chunks: Buffer[] = []
    for await (const chunk of stream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
    }

    return Buffer.concat(chunks)
  }

  private computeEtag(data: Buffer): string {
    return `"${createHash("md5").update(data).digest("hex")}"`
  }
}
