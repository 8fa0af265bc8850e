import { createStorage, type StoragePort } from "@cantus/storage"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraServices = {
  /** Absent when the storage driver is `none`; songs then stay local. */
  objectStorage?: StoragePort
}

export function createInfraServices(config: AppConfig, core: CoreServices): InfraServices {
  const storage = config.storage

  switch (storage.driver) {
    case "none":
      return {}
    case "memory":
      return { objectStorage: createStorage({ driver: "memory" }, core.clock) }
    case "fs":
      return { objectStorage: createStorage({ driver: "fs", rootDir: storage.rootDir }, core.clock) }
    case "gcs":
      return {
        objectStorage: createStorage(
          {
            driver: "gcs",
            ...(storage.projectId !== undefined && { projectId: storage.projectId }),
            ...(storage.keyFilename !== undefined && { keyFilename: storage.keyFilename }),
            ...(storage.keyspacePrefix !== undefined && { keyspacePrefix: storage.keyspacePrefix }),
          },
          core.clock,
        ),
      }
  }
}
