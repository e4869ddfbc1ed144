import { Readable } from "node:stream"
import {
  type _Object,
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  type S3Client,
} from "@aws-sdk/client-s3"
import { Upload } from "@aws-sdk/lib-storage"
import { getSignedUrl } from "@aws-sdk/s3-request-presigner"
import type { Clock } from "@stowage/clock"
import { DataError } from "../model/data.errors"
import type { StoragePort } from "../ports/storage"
import type {
  ObjectRef,
  StorageBucket,
  StorageData,
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

const NOT_FOUND_NAMES = new Set(["NotFound", "NoSuchKey"])
const ACCESS_DENIED_NAMES = new Set(["AccessDenied", "Forbidden", "AllAccessDisabled"])
const TRANSIENT_NAMES = new Set([
  "SlowDown",
  "Throttling",
  "ThrottlingException",
  "RequestTimeout",
  "RequestTimeTooSkewed",
  "ServiceUnavailable",
  "InternalError",
])

export interface S3StorageDeps {
  client: S3Client
  clock: Clock
}

export class S3Storage implements StoragePort {
  constructor(readonly deps: S3StorageDeps) {}

  async put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const params = {
      Bucket: ref.bucket,
      Key: ref.key,
      Body: data,
      ...(options?.contentType && { ContentType: options.contentType }),
      ...(options?.metadata && { Metadata: options.metadata }),
    }

    await this.call("put", ref, async () => {
      // Streams of unknown length need multipart; buffers go in one request.
      if (data instanceof Readable) {
        await new Upload({ client: this.deps.client, params }).done()
        return
      }

      await this.deps.client.send(new PutObjectCommand(params))
    })
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    return this.callOrNull("head", ref, async () => {
      const response = await this.deps.client.send(
        new HeadObjectCommand({
          Bucket: ref.bucket,
          Key: ref.key,
        }),
      )

      return this.toObjectMetadata(ref.key, response)
    })
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    return (await this.head(ref)) !== null
  }

  async get(ref: ObjectRef, options?: GetOptions): Promise<StorageObject | null> {
    const byteCount = options?.byteCount

    return this.callOrNull("get", ref, async () => {
      if (byteCount !== undefined && byteCount <= 0) {
        const metadata = await this.head(ref)
        return metadata && { ...metadata, body: Buffer.alloc(0) }
      }

      const response = await this.deps.client.send(
        new GetObjectCommand({
          Bucket: ref.bucket,
          Key: ref.key,
          ...(byteCount !== undefined && { Range: `bytes=0-${byteCount - 1}` }),
        }),
      )

      const bytes = response.Body ? await response.Body.transformToByteArray() : new Uint8Array()

      return {
        ...this.toObjectMetadata(ref.key, response),
        body: Buffer.from(bytes),
      }
    })
  }

  async delete(ref: ObjectRef): Promise<void> {
    await this.call("delete", ref, async () => {
      await this.deps.client.send(
        new DeleteObjectCommand({
          Bucket: ref.bucket,
          Key: ref.key,
        }),
      )
    })
  }

  async list(bucket: StorageBucket, options?: ListOptions): Promise<ListResult> {
    const prefix = options?.prefix

    const response = await this.call("list", { bucket, key: prefix ?? "" }, () =>
      this.deps.client.send(
        new ListObjectsV2Command({
          Bucket: bucket,
          ...(prefix && { Prefix: prefix }),
          ...(options?.maxKeys && { MaxKeys: options.maxKeys }),
          ...(options?.cursor && { ContinuationToken: options.cursor }),
        }),
      ),
    )

    return {
      objects: this.mapListContents(response.Contents),
      ...(response.NextContinuationToken && { cursor: response.NextContinuationToken }),
    }
  }

  async copy(src: ObjectRef, dst: ObjectRef, options?: CopyOptions): Promise<void> {
    const copySource = encodeURIComponent(`${src.bucket}/${src.key}`)

    await this.call("copy", src, async () => {
      await this.deps.client.send(
        new CopyObjectCommand({
          Bucket: dst.bucket,
          Key: dst.key,
          CopySource: copySource,
          ...(options?.metadata
            ? { Metadata: options.metadata, MetadataDirective: "REPLACE" }
            : { MetadataDirective: "COPY" }),
        }),
      )
    })
  }

  async getPresignedDownloadUrl(ref: ObjectRef, options?: PresignedUrlOptions): Promise<URL> {
    const command = new GetObjectCommand({
      Bucket: ref.bucket,
      Key: ref.key,
    })

    const url = await this.call("presign", ref, () =>
      getSignedUrl(this.deps.client, command, {
        ...(options?.expiresInSeconds && { expiresIn: options.expiresInSeconds }),
      }),
    )

    return new URL(url)
  }

  private async call<T>(operation: string, ref: ObjectRef, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      throw this.translateError(operation, ref, err)
    }
  }

  private async callOrNull<T>(
    operation: string,
    ref: ObjectRef,
    fn: () => Promise<T>,
  ): Promise<T | null> {
    try {
      return await fn()
    } catch (err) {
      if (isMissingKeyError(err)) return null
      throw this.translateError(operation, ref, err)
    }
  }

  private translateError(operation: string, ref: ObjectRef, err: unknown): DataError {
    const name = errorName(err)
    const status = httpStatus(err)

    if (name === "NoSuchBucket" || isMissingKeyError(err)) return DataError.notFound(ref, err)

    if ((name && ACCESS_DENIED_NAMES.has(name)) || status === 403) {
      return DataError.accessDenied(operation, ref, err)
    }

    const isRetryable =
      hasRetryableMarker(err) ||
      (name !== undefined && TRANSIENT_NAMES.has(name)) ||
      (status !== undefined && status >= 500)

    return DataError.backendError(operation, ref, err, isRetryable)
  }

  private toObjectMetadata(
    key: string,
    response: {
      ContentLength?: number | undefined
      LastModified?: Date | undefined
      ETag?: string | undefined
      ContentType?: string | undefined
      Metadata?: Record<string, string> | undefined
    },
  ): StorageObjectMetadata {
    return {
      key,
      sizeInBytes: response.ContentLength ?? 0,
      lastModified: response.LastModified ?? this.deps.clock.now(),
      ...(response.ETag && { etag: response.ETag }),
      ...(response.ContentType && { contentType: response.ContentType }),
      ...(response.Metadata && { metadata: response.Metadata }),
    }
  }

  private mapListContents(contents: _Object[] | undefined): StorageObjectMetadata[] {
    if (!contents) return []

    return contents
      .filter((obj): obj is _Object & { Key: string } => Boolean(obj.Key))
      .map((obj) => ({
        key: obj.Key,
        sizeInBytes: obj.Size ?? 0,
        lastModified: obj.LastModified ?? this.deps.clock.now(),
        ...(obj.ETag && { etag: obj.ETag }),
      }))
  }
}

function errorName(err: unknown): string | undefined {
  return err instanceof Error ? err.name : undefined
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("$metadata" in err)) return undefined

  const metadata = err.$metadata
  if (typeof metadata !== "object" || metadata === null || !("httpStatusCode" in metadata)) {
    return undefined
  }

  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined
}

function hasRetryableMarker(err: unknown): boolean {
  return typeof err === "object" && err !== null && "$retryable" in err && Boolean(err.$retryable)
}

function isMissingKeyError(err: unknown): boolean {
  const name = errorName(err)
  if (name === "NoSuchBucket") return false

  return (name !== undefined && NOT_FOUND_NAMES.has(name)) || httpStatus(err) === 404
}
