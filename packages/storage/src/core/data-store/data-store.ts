import { type Logger, NullLogger } from "@stowage/logger"
import { DataError } from "../../model/data.errors"
import type { StoragePort } from "../../ports/storage"
import type { ObjectRef, StorageObject, StorageObjectMetadata } from "../../ports/storage-object"
import type { PresignedUrlOptions } from "../../ports/storage-options"
import type { FormatCodec } from "../formats/codecs/format-codec"
import type { DataValue, Format, FormatValues } from "../formats/format"
import { codecFor, contentTypeFor, getCodec } from "../formats/registry"
import { type LocationInput, resolveLocation } from "../location/location"

export type DataStoreDeps = {
  storage: StoragePort
  logger?: Logger
}

export interface ReadOptions {
  /** Format tag; inferred from the key suffix when omitted. */
  format?: string
}

export interface WriteOptions {
  format?: string
  contentType?: string
  metadata?: Record<string, string>
}

export interface AppendOptions {
  format?: string
  /** Inserted between existing content and the appended value. Default: "" */
  separator?: string
}

export interface ReadBytesOptions {
  /** Read at most this many leading bytes. */
  byteCount?: number
}

export interface ListObjectsOptions {
  /** Include zero-byte objects such as folder markers. Default: false */
  includeEmpty?: boolean
  pageSize?: number
}

export class DataStore {
  private readonly logger: Logger

  constructor(private readonly deps: DataStoreDeps) {
    this.logger = (deps.logger ?? new NullLogger()).child({ module: "data-store" })
  }

  /**
   * Fetch an object and decode it. Every call goes to the backend.
   *
   * @example
   * ```ts
   * const users = await store.read("s3://analytics/exports/users.json")
   * const rows = await store.read({ bucket: "analytics", key: "raw/events" }, { format: "delimited-rows" })
   * ```
   */
  async read<F extends Format>(location: LocationInput, options: { format: F }): Promise<FormatValues[F]>
  async read(location: LocationInput, options?: ReadOptions): Promise<DataValue>
  async read(location: LocationInput, options: ReadOptions = {}): Promise<DataValue> {
    const ref = resolveLocation(location)
    const { format, codec } = codecFor(options.format, ref.key)

    const object = await this.fetch(ref)
    const value = codec.decode(object.body)

    this.logger.debug("Object read", {
      operation: "read",
      bucket: ref.bucket,
      key: ref.key,
      format,
      sizeInBytes: object.body.length,
    })

    return value
  }

  async readAs<F extends Format>(location: LocationInput, format: F): Promise<FormatValues[F]> {
    const ref = resolveLocation(location)
    const codec = getCodec(format)

    const object = await this.fetch(ref)
    const value = codec.decode(object.body)

    this.logger.debug("Object read", {
      operation: "read",
      bucket: ref.bucket,
      key: ref.key,
      format,
      sizeInBytes: object.body.length,
    })

    return value
  }

  async readBytes(location: LocationInput, options: ReadBytesOptions = {}): Promise<Uint8Array> {
    const ref = resolveLocation(location)
    const object = await this.fetch(ref, options.byteCount)

    this.logger.debug("Object bytes read", {
      operation: "readBytes",
      bucket: ref.bucket,
      key: ref.key,
      sizeInBytes: object.body.length,
    })

    return object.body
  }

  /**
   * Encode `value` and store it, overwriting any existing object.
   * Resolves once the backend has acknowledged the write.
   */
  async write<F extends Format>(
    value: FormatValues[F],
    location: LocationInput,
    options: WriteOptions & { format: F },
  ): Promise<ObjectRef>
  async write(value: unknown, location: LocationInput, options?: WriteOptions): Promise<ObjectRef>
  async write(value: unknown, location: LocationInput, options: WriteOptions = {}): Promise<ObjectRef> {
    const ref = resolveLocation(location)
    const selection = codecFor(options.format, ref.key)
    const bytes = this.encode(selection.codec, selection.format, value)

    await this.deps.storage.put(ref, bytes, {
      contentType: options.contentType ?? contentTypeFor(selection, ref.key, value),
      ...(options.metadata && { metadata: options.metadata }),
    })

    this.logger.debug("Object written", {
      operation: "write",
      bucket: ref.bucket,
      key: ref.key,
      format: selection.format,
      sizeInBytes: bytes.length,
    })

    return ref
  }

  /**
   * Append an encoded value to an object, creating it when missing.
   *
   * Read-modify-write: concurrent appends to the same key lose data.
   */
  async append(value: unknown, location: LocationInput, options: AppendOptions = {}): Promise<ObjectRef> {
    const ref = resolveLocation(location)
    const selection = codecFor(options.format, ref.key)
    const bytes = this.encode(selection.codec, selection.format, value)

    const existing = await this.deps.storage.get(ref)
    const separator =
      existing && existing.body.length > 0 && options.separator
        ? Buffer.from(options.separator, "utf8")
        : Buffer.alloc(0)

    const combined = Buffer.concat([existing?.body ?? Buffer.alloc(0), separator, bytes])

    await this.deps.storage.put(ref, combined, {
      contentType: existing?.contentType ?? contentTypeFor(selection, ref.key, value),
      ...(existing?.metadata && { metadata: existing.metadata }),
    })

    this.logger.debug("Object appended", {
      operation: "append",
      bucket: ref.bucket,
      key: ref.key,
      format: selection.format,
      sizeInBytes: combined.length,
    })

    return ref
  }

  async exists(location: LocationInput): Promise<boolean> {
    return this.deps.storage.exists(resolveLocation(location))
  }

  /** Size, content type, etag and modification time without the body. */
  async head(location: LocationInput): Promise<StorageObjectMetadata> {
    const ref = resolveLocation(location)
    const metadata = await this.deps.storage.head(ref)

    if (!metadata) throw DataError.notFound(ref)
    return metadata
  }

  async delete(location: LocationInput): Promise<void> {
    const ref = resolveLocation(location)
    await this.deps.storage.delete(ref)

    this.logger.debug("Object deleted", { operation: "delete", bucket: ref.bucket, key: ref.key })
  }

  /**
   * Objects under a bucket or prefix, fetched page by page as iteration
   * proceeds. Each iteration starts again from the first page. Zero-byte
   * objects are skipped unless `includeEmpty` is set.
   */
  list(location: LocationInput, options: ListObjectsOptions = {}): AsyncIterable<StorageObjectMetadata> {
    const ref = resolveLocation(location, { requireKey: false })

    return {
      [Symbol.asyncIterator]: () => this.listPages(ref, options),
    }
  }

  private async *listPages(
    { bucket, key: prefix }: ObjectRef,
    options: ListObjectsOptions,
  ): AsyncGenerator<StorageObjectMetadata> {
    let cursor: string | undefined

    do {
      const page = await this.deps.storage.list(bucket, {
        ...(prefix && { prefix }),
        ...(options.pageSize && { maxKeys: options.pageSize }),
        ...(cursor && { cursor }),
      })

      for (const object of page.objects) {
        if (object.sizeInBytes > 0 || options.includeEmpty) yield object
      }

      cursor = page.cursor
    } while (cursor)
  }

  async copy(source: LocationInput, destination: LocationInput): Promise<ObjectRef> {
    const src = resolveLocation(source)
    const dst = resolveLocation(destination)

    await this.deps.storage.copy(src, dst)

    this.logger.debug("Object copied", { operation: "copy", bucket: dst.bucket, key: dst.key })

    return dst
  }

  /** Copy, then delete the source. Not atomic. */
  async move(source: LocationInput, destination: LocationInput): Promise<ObjectRef> {
    const src = resolveLocation(source)
    const dst = await this.copy(src, destination)

    await this.deps.storage.delete(src)

    this.logger.debug("Object moved", { operation: "move", bucket: dst.bucket, key: dst.key })

    return dst
  }

  async presignDownload(location: LocationInput, options: PresignedUrlOptions = {}): Promise<URL> {
    return this.deps.storage.getPresignedDownloadUrl(resolveLocation(location), options)
  }

  private async fetch(ref: ObjectRef, byteCount?: number): Promise<StorageObject> {
    const object = await this.deps.storage.get(
      ref,
      byteCount !== undefined ? { byteCount } : undefined,
    )

    if (!object) throw DataError.notFound(ref)
    return object
  }

  private encode(
    codec: FormatCodec<DataValue>,
    format: Format,
    value: unknown,
  ): Uint8Array {
    if (!codec.accepts(value)) {
      throw DataError.encodeError(format, `value is not compatible with ${format}`)
    }
    return codec.encode(value)
  }
}
