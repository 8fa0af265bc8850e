import type { Logger } from "@cantus/logger"
import type { Middleware } from "../server/server"
import type { PathString, ResolvedRequestLoggingConfig } from "../server/server-options"

type EnabledConfig = Extract<ResolvedRequestLoggingConfig, { enabled: true }>

/**
 * One line per completed request: 5xx at `error`, everything else at the
 * configured level. Ignored paths (health probes by default) are not logged.
 */
export function requestLoggingMiddleware(config: EnabledConfig, baseLogger: Logger): Middleware {
  return async (c, next) => {
    const path = c.req.path

    if (isIgnored(path, config.ignorePaths)) {
      await next()
      return
    }

    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const userAgent = c.req.header("user-agent")
      const meta = {
        requestId: c.get("requestId") ?? "unknown",
        method: c.req.method,
        path,
        status,
        durationMs: Math.round(performance.now() - start),
        ...(userAgent !== undefined && { userAgent }),
      }

      const logger = c.get("logger") ?? baseLogger

      if (status >= 500) logger.error("Request completed", meta)
      else logger[config.level]("Request completed", meta)
    }
  }
}

function isIgnored(path: string, ignorePaths: PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
