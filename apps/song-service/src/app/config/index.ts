export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export type { LoadAppConfigOptions } from "./load-app-config"
export { envSchema, storageDrivers } from "./schema"
export type { AppConfig, EnvConfig, RoutePath, StorageConfig, StorageDriver } from "./schema"
