import { createHash } from "node:crypto"
import { Readable } from "node:stream"
import type { TimeSource } from "@cantus/clock"
import type { StoragePort } from "../ports/storage"
import type {
  ObjectRef,
  PutOptions,
  StorageData,
  StorageObject,
  StorageObjectMetadata,
} from "../ports/storage-object"
import { toBuffer } from "./to-buffer"

type StoredObject = {
  data: Buffer
  etag: string
  lastModified: Date
  contentType?: string
}

export interface MemoryStorageDeps {
  clock: TimeSource
}

export class MemoryStorage implements StoragePort {
  private readonly objects = new Map<string, StoredObject>()

  constructor(private readonly deps: MemoryStorageDeps) {}

  async put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const buffer = await toBuffer(data)

    this.objects.set(this.id(ref), {
      data: Buffer.from(buffer),
      etag: `"${createHash("md5").update(buffer).digest("hex")}"`,
      lastModified: this.deps.clock.now(),
      ...(options?.contentType && { contentType: options.contentType }),
    })
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    const stored = this.objects.get(this.id(ref))
    return stored ? this.toMetadata(ref, stored) : null
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    return this.objects.has(this.id(ref))
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    const stored = this.objects.get(this.id(ref))
    if (!stored) return null

    return {
      ...this.toMetadata(ref, stored),
      body: Readable.from([Buffer.from(stored.data)]),
    }
  }

  async delete(ref: ObjectRef): Promise<void> {
    this.objects.delete(this.id(ref))
  }

  /** Keys currently stored in `bucket`, sorted. */
  keys(bucket: string): string[] {
    const prefix = `${bucket}/`
    return [...this.objects.keys()]
      .filter((id) => id.startsWith(prefix))
      .map((id) => id.slice(prefix.length))
      .sort()
  }

  private id(ref: ObjectRef): string {
    return `${ref.bucket}/${ref.key}`
  }

  private toMetadata(ref: ObjectRef, stored: StoredObject): StorageObjectMetadata {
    return {
      key: ref.key,
      sizeInBytes: stored.data.length,
      lastModified: stored.lastModified,
      etag: stored.etag,
      ...(stored.contentType && { contentType: stored.contentType }),
    }
  }
}
