import { createReadStream } from "node:fs"
import { access } from "node:fs/promises"
import { errorMessage } from "@cantus/errors"
import type { Logger } from "@cantus/logger"
import type { ObjectRef, StoragePort } from "@cantus/storage"
import type { ArtifactUploader } from "../model/inference.model"
import { contentTypeFor } from "../services/output-discovery"

export type StorageArtifactUploaderDeps = {
  storage: StoragePort
  logger: Logger
}

export type StorageArtifactUploaderOptions = {
  bucket: string
}

export class StorageArtifactUploader implements ArtifactUploader {
  constructor(
    private readonly deps: StorageArtifactUploaderDeps,
    private readonly opts: StorageArtifactUploaderOptions,
  ) {}

  async upload(localPath: string, remoteKey: string): Promise<ObjectRef | null> {
    const ref: ObjectRef = { bucket: this.opts.bucket, key: remoteKey }

    try {
      await access(localPath)
      await this.deps.storage.put(ref, createReadStream(localPath), {
        contentType: contentTypeFor(localPath),
      })
    } catch (err) {
      this.deps.logger.warn("Upload failed, file stays local", {
        localPath,
        bucket: ref.bucket,
        key: ref.key,
        reason: errorMessage(err),
      })
      return null
    }

    this.deps.logger.debug("Uploaded artifact", { localPath, bucket: ref.bucket, key: ref.key })
    return ref
  }
}
