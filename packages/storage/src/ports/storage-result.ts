import type { StorageObjectMetadata } from "./storage-object"

export interface ListResult {
  objects: StorageObjectMetadata[]

  /** Set while more pages remain. */
  cursor?: string
}
