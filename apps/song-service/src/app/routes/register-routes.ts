import { type Application, createRouter } from "@cantus/server"
import { createLyricsModule, createSongsModule } from "../../domains/songs"
import type { AppConfig } from "../config"
import type { AppServices } from "../services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(app: Application, config: AppConfig, services: AppServices): void {
  const apiV1Router = createRouter()

  const modules: ApiModule[] = [
    createSongsModule({ songs: services.songs }),
    createLyricsModule({ songs: services.songs }),
  ]

  for (const m of modules) {
    m.register(apiV1Router)
  }

  app.route("/api/v1", apiV1Router)
  app.get("/", (c) => c.text(`Welcome to ${config.logging.serviceName} API`))
}

export type RegisterRoutesFn = typeof registerRoutes
