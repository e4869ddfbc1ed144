export { S3Client } from "@aws-sdk/client-s3"
export {
  type CreateMemoryStorageOptions,
  type CreateS3StorageOptions,
  createMemoryStorage,
  createS3Storage,
} from "./adapters/create"
export { MemoryStorage, type MemoryStorageDeps } from "./adapters/memory-storage"
export { S3Storage, type S3StorageDeps } from "./adapters/s3-storage"
export {
  type AppendOptions,
  DataStore,
  type DataStoreDeps,
  type ListObjectsOptions,
  type ReadBytesOptions,
  type ReadOptions,
  type WriteOptions,
} from "./core/data-store/data-store"
export { sniffImageType } from "./core/formats/codecs/binary-image-codec"
export type { FormatCodec } from "./core/formats/codecs/format-codec"
export {
  type DataValue,
  type Format,
  type FormatValues,
  formats,
  type ImageMediaType,
  type ImageObject,
  isFormat,
  type JsonValue,
} from "./core/formats/format"
export {
  type CodecSelection,
  codecFor,
  contentTypeFor,
  contentTypeForKey,
  getCodec,
  inferFormat,
  resolveFormat,
} from "./core/formats/registry"
export {
  basename,
  formatUri,
  joinUri,
  type LocationInput,
  objectUrl,
  parseUri,
  type ResolveOptions,
  resolveLocation,
  splitExtension,
} from "./core/location/location"
export {
  configureSession,
  currentSession,
  defaultDataStore,
  resetSession,
} from "./core/session/default-session"
export {
  loadSessionConfig,
  type SessionConfig,
  type SessionEnv,
  sessionEnvSchema,
  toSessionConfig,
} from "./core/session/load-session-config"
export {
  type CreateDataStoreOptions,
  createDataStore,
  createS3Client,
  type SessionCredentials,
  type SessionOptions,
  s3ClientConfig,
} from "./core/session/session"
export {
  DataError,
  type DataErrorCode,
  type DecodeErrorDetail,
  type EncodeErrorDetail,
  isDataError,
} from "./model/data.errors"
export type { Codec } from "./ports/codec"
export type { StoragePort } from "./ports/storage"
export type {
  Bytes,
  ObjectRef,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "./ports/storage-object"
export type {
  CopyOptions,
  GetOptions,
  ListOptions,
  PresignedUrlOptions,
  PutOptions,
} from "./ports/storage-options"
export type { ListResult } from "./ports/storage-result"
