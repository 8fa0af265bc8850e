import type {
  ObjectRef,
  PutOptions,
  StorageData,
  StorageObject,
  StorageObjectMetadata,
} from "./storage-object"

export interface StoragePort {
  /** Overwrites an existing object. */
  put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void>

  head(ref: ObjectRef): Promise<StorageObjectMetadata | null>

  exists(ref: ObjectRef): Promise<boolean>

  get(ref: ObjectRef): Promise<StorageObject | null>

  /** No-op when the object is missing. */
  delete(ref: ObjectRef): Promise<void>
}
