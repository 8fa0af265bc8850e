import { fileURLToPath } from "node:url"
import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type RegisterRoutesFn, registerRoutes } from "./routes/register-routes"
import { type AppServices, createDefaultServices, type ServiceOverrides } from "./services"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  /** Env-style keys, applied after every other config source. */
  configOverrides?: Record<string, unknown>
  /** Directory holding `config.json` and `.env.*`; the service root by default. */
  cwd?: string
  overrides?: ServiceOverrides
}

export type AppContext = {
  config: AppConfig
  services: AppServices
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

const serviceRoot = fileURLToPath(new URL("../../", import.meta.url))

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, {
    cwd: options.cwd ?? serviceRoot,
    ...(options.configOverrides && { overrides: options.configOverrides }),
  })

  const services = await createDefaultServices(config, options.overrides)

  return {
    config,
    services,
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
