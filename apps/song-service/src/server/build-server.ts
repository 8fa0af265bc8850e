import {
  type Application,
  createServer,
  type ErrorMappingsConfig,
  isValidationError,
  type LifecycleHook,
  type Server,
} from "@cantus/server"
import type { AppContext } from "../app/create-context"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export const errorMappings: ErrorMappingsConfig = {
  mappings: {
    validation_error: { status: 400 },
    invalid_submission: { status: 400 },
    provider_unavailable: { status: 400 },
    provider_failed: { status: 502, message: "The lyrics provider request failed" },
    job_not_found: { status: 404 },
    artifact_not_found: { status: 404 },
    invalid_job_state: { status: 409, message: "The job changed while the request ran" },
  },
  transformContext: (error) =>
    isValidationError(error) ? { issues: error.context["issues"] } : undefined,
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = ctx.createStartHooks(ctx)
  const stopHooks = ctx.createStopHooks(ctx)

  const server = createServer(
    {
      clock: ctx.services.clock,
      logger: ctx.services.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      health: {
        enabled: true,
        livenessPath: ctx.config.server.livenessPath,
        readinessPath: ctx.config.server.readinessPath,
      },

      errorHandling: { kind: "mappings", config: errorMappings },

      requestId: ctx.config.requestId.enabled
        ? {
            enabled: true,
            header: ctx.config.requestId.header,
            fallbackToTraceparent: ctx.config.requestId.fallbackToTraceparent,
          }
        : { enabled: false },

      requestLogging: ctx.config.requestLogging.enabled
        ? { enabled: true, level: ctx.config.requestLogging.level }
        : { enabled: false },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.config, ctx.services)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
    stopHooks,
  }
}
