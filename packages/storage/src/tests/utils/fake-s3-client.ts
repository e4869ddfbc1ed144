import { createHash } from "node:crypto"
import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3ServiceException,
} from "@aws-sdk/client-s3"

type FakeObject = {
  body: Buffer
  contentType?: string
  metadata?: Record<string, string>
  lastModified: Date
  etag: string
}

export type FakeS3Failure = {
  name: string
  status: number
  retryable?: boolean
}

/**
 * In-process stand-in for the parts of `S3Client` the storage adapter
 * uses. Buckets must be created before use; commands are recorded.
 */
export class FakeS3Client {
  readonly commands: unknown[] = []
  private readonly buckets = new Map<string, Map<string, FakeObject>>()
  private nextFailure: FakeS3Failure | undefined

  createBucket(name: string): void {
    if (!this.buckets.has(name)) this.buckets.set(name, new Map())
  }

  /** The next command rejects with this service error. */
  failNext(failure: FakeS3Failure): void {
    this.nextFailure = failure
  }

  rawKeys(bucket: string): string[] {
    return Array.from(this.buckets.get(bucket)?.keys() ?? []).sort()
  }

  async send(command: unknown): Promise<unknown> {
    this.commands.push(command)

    if (this.nextFailure) {
      const failure = this.nextFailure
      this.nextFailure = undefined
      throw serviceError(failure.name, failure.status, failure.retryable)
    }

    if (command instanceof PutObjectCommand) return this.put(command)
    if (command instanceof HeadObjectCommand) return this.head(command)
    if (command instanceof GetObjectCommand) return this.get(command)
    if (command instanceof DeleteObjectCommand) return this.delete(command)
    if (command instanceof ListObjectsV2Command) return this.list(command)
    if (command instanceof CopyObjectCommand) return this.copy(command)

    throw new Error("FakeS3Client: unsupported command")
  }

  destroy(): void {}

  private put({ input }: PutObjectCommand) {
    const bucket = this.bucket(input.Bucket)
    const body = toBuffer(input.Body)

    bucket.set(input.Key ?? "", {
      body,
      lastModified: new Date(),
      etag: etagOf(body),
      ...(input.ContentType && { contentType: input.ContentType }),
      ...(input.Metadata && { metadata: { ...input.Metadata } }),
    })

    return { ETag: etagOf(body) }
  }

  private head({ input }: HeadObjectCommand) {
    const object = this.bucket(input.Bucket).get(input.Key ?? "")
    if (!object) throw serviceError("NotFound", 404)

    return describeObject(object, object.body.length)
  }

  private get({ input }: GetObjectCommand) {
    const object = this.bucket(input.Bucket).get(input.Key ?? "")
    if (!object) throw serviceError("NoSuchKey", 404)

    const range = /^bytes=(\d+)-(\d+)$/.exec(input.Range ?? "")
    const body = range
      ? object.body.subarray(Number(range[1]), Number(range[2]) + 1)
      : object.body

    return {
      ...describeObject(object, body.length),
      Body: { transformToByteArray: async () => new Uint8Array(body) },
    }
  }

  private delete({ input }: DeleteObjectCommand) {
    this.bucket(input.Bucket).delete(input.Key ?? "")
    return {}
  }

  private list({ input }: ListObjectsV2Command) {
    const bucket = this.bucket(input.Bucket)
    const prefix = input.Prefix ?? ""
    const maxKeys = input.MaxKeys ?? 1000
    const after = input.ContinuationToken

    const keys = Array.from(bucket.keys())
      .filter((key) => key.startsWith(prefix))
      .filter((key) => after === undefined || key > after)
      .sort()

    const page = keys.slice(0, maxKeys)
    const truncated = keys.length > maxKeys

    return {
      Contents: page.map((key) => {
        const object = bucket.get(key)
        return {
          Key: key,
          Size: object?.body.length ?? 0,
          LastModified: object?.lastModified,
          ETag: object?.etag,
        }
      }),
      KeyCount: page.length,
      IsTruncated: truncated,
      ...(truncated && { NextContinuationToken: page[page.length - 1] }),
    }
  }

  private copy({ input }: CopyObjectCommand) {
    const source = decodeURIComponent(input.CopySource ?? "")
    const slash = source.indexOf("/")
    const object = this.bucket(source.slice(0, slash)).get(source.slice(slash + 1))
    if (!object) throw serviceError("NoSuchKey", 404)

    const metadata = input.MetadataDirective === "REPLACE" ? input.Metadata : object.metadata

    this.bucket(input.Bucket).set(input.Key ?? "", {
      ...object,
      body: Buffer.from(object.body),
      lastModified: new Date(),
      metadata: metadata && { ...metadata },
    })

    return { CopyObjectResult: { ETag: object.etag } }
  }

  private bucket(name: string | undefined): Map<string, FakeObject> {
    const bucket = this.buckets.get(name ?? "")
    if (!bucket) throw serviceError("NoSuchBucket", 404)
    return bucket
  }
}

function describeObject(object: FakeObject, length: number) {
  return {
    ContentLength: length,
    LastModified: object.lastModified,
    ETag: object.etag,
    ...(object.contentType && { ContentType: object.contentType }),
    ...(object.metadata && { Metadata: object.metadata }),
  }
}

function toBuffer(body: unknown): Buffer {
  if (typeof body === "string") return Buffer.from(body)
  if (body instanceof Uint8Array) return Buffer.from(body)

  throw new Error("FakeS3Client: only buffered bodies are supported")
}

function etagOf(body: Buffer): string {
  return `"${createHash("md5").update(body).digest("hex")}"`
}

export function serviceError(name: string, status: number, retryable = false): S3ServiceException {
  const err = new S3ServiceException({
    name,
    $fault: status >= 500 ? "server" : "client",
    $metadata: { httpStatusCode: status },
    message: `${name} (fake)`,
  })

  return retryable ? Object.assign(err, { $retryable: {} }) : err
}
