import { serve } from "@hono/node-server"
import type { Logger } from "@cantus/logger"
import type { Application } from "../server/server"
import type { ResolvedServerOptions } from "../server/server-options"
import type { Closeable } from "./shutdown"

export function listen(
  app: Application,
  options: ResolvedServerOptions,
  logger: Logger,
): Closeable {
  const server = serve({ fetch: app.fetch, port: options.port, hostname: options.host })

  logger.info(`Listening on http://${options.host}:${options.port}`)

  return server
}

export type ListenFn = typeof listen
