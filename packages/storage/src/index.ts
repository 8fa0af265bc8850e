export { createStorage } from "./adapters/create"
export type { StorageDriverConfig } from "./adapters/create"
export { FileSystemStorage } from "./adapters/fs-storage"
export type { FsStorageOptions } from "./adapters/fs-storage"
export { GcsStorage } from "./adapters/gcs-storage"
export type {
  GcsClient,
  GcsFileHandle,
  GcsStorageDeps,
  GcsStorageOptions,
} from "./adapters/gcs-storage"
export { MemoryStorage } from "./adapters/memory-storage"
export type { StoragePort } from "./ports/storage"
export { StorageError } from "./ports/storage-error"
export type {
  Bytes,
  ObjectRef,
  PutOptions,
  StorageBucket,
  StorageData,
  StorageKey,
  StorageObject,
  StorageObjectMetadata,
} from "./ports/storage-object"
