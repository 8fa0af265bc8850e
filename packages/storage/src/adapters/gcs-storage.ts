import { Readable, type Writable } from "node:stream"
import { pipeline } from "node:stream/promises"
import type { FileMetadata } from "@google-cloud/storage"
import type { TimeSource } from "@cantus/clock"
import type { StoragePort } from "../ports/storage"
import type {
  ObjectRef,
  PutOptions,
  StorageData,
  StorageObject,
  StorageObjectMetadata,
} from "../ports/storage-object"

/** The part of a GCS `File` the adapter touches. */
export interface GcsFileHandle {
  createWriteStream(options: { resumable: boolean; metadata?: { contentType: string } }): Writable
  createReadStream(): Readable
  getMetadata(): Promise<[FileMetadata, ...unknown[]]>
  exists(): Promise<[boolean]>
  delete(options: { ignoreNotFound: boolean }): Promise<unknown>
}

/** Satisfied by `Storage` from `@google-cloud/storage`. */
export interface GcsClient {
  bucket(name: string): { file(name: string): GcsFileHandle }
}

export interface GcsStorageDeps {
  client: GcsClient
  clock: TimeSource
}

export interface GcsStorageOptions {
  /** Prepended to every key, e.g. "songs". */
  keyspacePrefix?: string
  /** Resumable uploads survive flaky links but cost an extra round trip. @default true */
  resumable?: boolean
}

export class GcsStorage implements StoragePort {
  constructor(
    private readonly deps: GcsStorageDeps,
    private readonly options: GcsStorageOptions = {},
  ) {}

  async put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const source = data instanceof Readable ? data : Readable.from([Buffer.from(data)])

    const writeStream = this.file(ref).createWriteStream({
      resumable: this.options.resumable ?? true,
      ...(options?.contentType && { metadata: { contentType: options.contentType } }),
    })

    await pipeline(source, writeStream)
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    try {
      const [metadata] = await this.file(ref).getMetadata()
      return this.toObjectMetadata(ref, metadata)
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    const [exists] = await this.file(ref).exists()
    return exists
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    const meta = await this.head(ref)
    if (!meta) return null

    return { ...meta, body: this.file(ref).createReadStream() }
  }

  async delete(ref: ObjectRef): Promise<void> {
    await this.file(ref).delete({ ignoreNotFound: true })
  }

  private file(ref: ObjectRef): GcsFileHandle {
    return this.deps.client.bucket(ref.bucket).file(this.prefixKey(ref.key))
  }

  private prefixKey(key: string): string {
    const prefix = this.options.keyspacePrefix
    if (!prefix) return key
    return prefix.endsWith("/") ? `${prefix}${key}` : `${prefix}/${key}`
  }

  private toObjectMetadata(ref: ObjectRef, m: FileMetadata): StorageObjectMetadata {
    const size = typeof m.size === "string" ? Number.parseInt(m.size, 10) : m.size
    const updated = m.updated ? new Date(m.updated) : undefined

    return {
      key: ref.key,
      sizeInBytes: size !== undefined && Number.isFinite(size) ? size : 0,
      lastModified:
        updated && !Number.isNaN(updated.getTime()) ? updated : this.deps.clock.now(),
      ...(m.etag && { etag: m.etag }),
      ...(m.contentType && { contentType: m.contentType }),
    }
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === 404
}
