import { registerHealthRoutes } from "../routes/health"
import type { ErrorHandler } from "../errors/create-error-handler"
import { notFoundHandler } from "../errors/not-found"
import type { Application, Middleware } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  app: Application
  options: ResolvedServerOptions
  isReady: () => boolean
  errorHandler: ErrorHandler
  defaultMiddleware: Middleware[]
}

/**
 * Order: health routes, default middleware, `pre` middleware, routes,
 * `post` middleware, then the not-found and error handlers.
 */
export function buildApp(ctx: BuildAppContext): Application {
  const { app, options } = ctx

  if (options.health.enabled) {
    registerHealthRoutes(app, options.health, ctx.isReady)
  }

  for (const mw of [...ctx.defaultMiddleware, ...options.middleware.pre]) app.use("*", mw)
  options.routes(app)
  for (const mw of options.middleware.post) app.use("*", mw)

  app.notFound(notFoundHandler)
  app.onError(ctx.errorHandler)

  return app
}

export type BuildAppFn = typeof buildApp
