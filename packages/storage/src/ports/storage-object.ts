import type { Readable } from "node:stream"

export type StorageData = Readable | Buffer | Uint8Array

export type Bytes = number

/** Path-like, e.g. "user_1_job_2_my_song/my_song.wav". */
export type StorageKey = string

export type StorageBucket = string

export interface ObjectRef {
  bucket: StorageBucket
  key: StorageKey
}

export type StorageObjectMetadata = {
  key: StorageKey
  sizeInBytes: Bytes
  lastModified: Date
  contentType?: string
  etag?: string
}

export interface StorageObject extends StorageObjectMetadata {
  body: Readable
}

export interface PutOptions {
  contentType?: string
}
