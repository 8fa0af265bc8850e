import {
  createSongServices,
  type SongServiceOverrides,
  type SongServices,
} from "../../domains/songs"
import type { AppConfig } from "../config"
import { type CoreServices, createCoreServices } from "./core"
import { createInfraServices, type InfraServices } from "./infra"

export type AppServices = CoreServices &
  InfraServices & {
    songs: SongServices
  }

export type ServiceOverrides = {
  core?: Partial<CoreServices>
  infra?: Partial<InfraServices>
  songs?: SongServiceOverrides
}

export async function createDefaultServices(
  config: AppConfig,
  overrides: ServiceOverrides = {},
): Promise<AppServices> {
  const core: CoreServices = { ...createCoreServices(config), ...overrides.core }
  const infra: InfraServices = { ...createInfraServices(config, core), ...overrides.infra }

  const songs = await createSongServices(config, core, infra, overrides.songs)

  return {
    ...core,
    ...infra,
    songs,
  }
}
