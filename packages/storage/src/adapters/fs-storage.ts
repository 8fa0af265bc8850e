import { createHash } from "node:crypto"
import { createReadStream, createWriteStream } from "node:fs"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import type { StoragePort } from "../ports/storage"
import { StorageError } from "../ports/storage-error"
import type {
  ObjectRef,
  PutOptions,
  StorageData,
  StorageObject,
  StorageObjectMetadata,
} from "../ports/storage-object"

type Sidecar = {
  etag: string
  contentType?: string
}

function isSidecar(v: unknown): v is Sidecar {
  if (typeof v !== "object" || v === null) return false
  if (!("etag" in v) || typeof v.etag !== "string") return false
  return !("contentType" in v) || typeof v.contentType === "string"
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export interface FsStorageOptions {
  rootDir: string
}

/**
 * Buckets are directories under `rootDir`. Content type and etag live in a
 * `<file>.meta.json` sidecar.
 */
export class FileSystemStorage implements StoragePort {
  private readonly rootDir: string

  constructor(options: FsStorageOptions) {
    this.rootDir = path.resolve(options.rootDir)
  }

  async put(ref: ObjectRef, data: StorageData, options?: PutOptions): Promise<void> {
    const filePath = this.resolveFilePath(ref)
    await fs.mkdir(path.dirname(filePath), { recursive: true })

    const source = data instanceof Readable ? data : Readable.from([Buffer.from(data)])
    await pipeline(source, createWriteStream(filePath))

    const sidecar: Sidecar = {
      etag: await this.computeEtag(filePath),
      ...(options?.contentType && { contentType: options.contentType }),
    }
    await fs.writeFile(this.sidecarPath(filePath), JSON.stringify(sidecar))
  }

  async head(ref: ObjectRef): Promise<StorageObjectMetadata | null> {
    const filePath = this.resolveFilePath(ref)

    try {
      const stat = await fs.stat(filePath)
      const sidecar = await this.loadSidecar(filePath)

      return {
        key: ref.key,
        sizeInBytes: stat.size,
        lastModified: stat.mtime,
        etag: sidecar?.etag ?? (await this.computeEtag(filePath)),
        ...(sidecar?.contentType && { contentType: sidecar.contentType }),
      }
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  async exists(ref: ObjectRef): Promise<boolean> {
    return (await this.head(ref)) !== null
  }

  async get(ref: ObjectRef): Promise<StorageObject | null> {
    const meta = await this.head(ref)
    if (!meta) return null

    return { ...meta, body: createReadStream(this.resolveFilePath(ref)) }
  }

  async delete(ref: ObjectRef): Promise<void> {
    const filePath = this.resolveFilePath(ref)

    await fs.rm(filePath, { force: true })
    await fs.rm(this.sidecarPath(filePath), { force: true })
  }

  private resolveFilePath(ref: ObjectRef): string {
    const { key } = ref
    if (key.startsWith("/")) throw StorageError.invalidKey(key, "must not start with '/'")
    if (key.includes("\\")) throw StorageError.invalidKey(key, "must not contain backslashes")

    const segments = key.split("/")
    if (segments.some((s) => s === "" || s === "." || s === "..")) {
      throw StorageError.invalidKey(key, "must not contain empty, '.' or '..' segments")
    }

    const bucketDir = path.join(this.rootDir, ref.bucket)
    const filePath = path.join(bucketDir, ...segments)

    if (!filePath.startsWith(bucketDir + path.sep)) {
      throw StorageError.invalidKey(key, "escapes the bucket directory")
    }
    return filePath
  }

  private sidecarPath(filePath: string): string {
    return `${filePath}.meta.json`
  }

  private async computeEtag(filePath: string): Promise<string> {
    const content = await fs.readFile(filePath)
    return `"${createHash("md5").update(content).digest("hex")}"`
  }

  private async loadSidecar(filePath: string): Promise<Sidecar | null> {
    let raw: string
    try {
      raw = await fs.readFile(this.sidecarPath(filePath), "utf-8")
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }

    try {
      const parsed: unknown = JSON.parse(raw)
      return isSidecar(parsed) ? parsed : null
    } catch {
      return null
    }
  }
}
