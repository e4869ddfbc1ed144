import type {
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageObject,
  StorageObjectMetadata,
} from "./storage-object"
import type {
  CopyOptions,
  GetOptions,
  ListOptions,
  PresignedUrlOptions,
  PutOptions,
} from "./storage-options"
import type { ListResult } from "./storage-result"

/**
 * Byte-level object store.
 *
 * Adapters report a missing object as `null` and translate every other
 * backend failure into a `DataError` ("access_denied" or "backend_error").
 */
export interface StoragePort {
  /** Upload an object. Overwrites if exists. */
  put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void>

  /** Metadata without body; `null` if not found. */
  head(ref: ObjectRef): Promise<StorageObjectMetadata | null>

  exists(ref: ObjectRef): Promise<boolean>

  /** Object with body; `null` if not found. */
  get(ref: ObjectRef, options?: GetOptions): Promise<StorageObject | null>

  /** No-op if not found. */
  delete(ref: ObjectRef): Promise<void>

  /** One page of objects, ordered by key. */
  list(bucket: StorageBucket, options?: ListOptions): Promise<ListResult>

  copy(src: ObjectRef, dst: ObjectRef, options?: CopyOptions): Promise<void>

  getPresignedDownloadUrl(ref: ObjectRef, options?: PresignedUrlOptions): Promise<URL>
}
