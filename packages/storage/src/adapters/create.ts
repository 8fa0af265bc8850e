import { Storage } from "@google-cloud/storage"
import type { TimeSource } from "@cantus/clock"
import type { StoragePort } from "../ports/storage"
import { FileSystemStorage } from "./fs-storage"
import { GcsStorage } from "./gcs-storage"
import { MemoryStorage } from "./memory-storage"

export type StorageDriverConfig =
  | { driver: "memory" }
  | { driver: "fs"; rootDir: string }
  | { driver: "gcs"; projectId?: string; keyFilename?: string; keyspacePrefix?: string }

export function createStorage(config: StorageDriverConfig, clock: TimeSource): StoragePort {
  switch (config.driver) {
    case "memory":
      return new MemoryStorage({ clock })
    case "fs":
      return new FileSystemStorage({ rootDir: config.rootDir })
    case "gcs": {
      const client = new Storage({
        ...(config.projectId && { projectId: config.projectId }),
        ...(config.keyFilename && { keyFilename: config.keyFilename }),
      })
      return new GcsStorage(
        { client, clock },
        { ...(config.keyspacePrefix && { keyspacePrefix: config.keyspacePrefix }) },
      )
    }
  }
}
