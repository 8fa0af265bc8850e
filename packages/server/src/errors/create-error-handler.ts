import type { ErrorCode } from "@cantus/errors"
import type { Logger } from "@cantus/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import type { StatusCode } from "../http/status-codes"
import type { ResolvedServerOptions } from "../server/server-options"
import { createErrorFormatter, type ErrorMappingsConfig } from "./errors"

export type ErrorHandler = HonoErrorHandler

export function createErrorHandler(
  options: ResolvedServerOptions,
  logger: Logger,
): ErrorHandler {
  return options.errorHandling.kind === "handler"
    ? options.errorHandling.errorHandler
    : mappingErrorHandler(options.errorHandling.config, logger)
}

export type CreateErrorHandlerFn = typeof createErrorHandler

function mappingErrorHandler(config: ErrorMappingsConfig, logger: Logger): ErrorHandler {
  const format = createErrorFormatter(config)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = format(err, requestId)

    logFailure(c.get("logger") ?? logger, err, {
      requestId,
      method: c.req.method,
      path: c.req.path,
      status: response.error.status,
      code: response.error.code,
    })

    return c.json(response, response.error.status)
  }
}

type FailureMeta = {
  requestId: string
  method: string
  path: string
  status: StatusCode
  code: ErrorCode
}

// 5xx at error with the cause; 4xx at info, cause only at debug.
function logFailure(logger: Logger, err: unknown, meta: FailureMeta): void {
  if (meta.status >= 500) {
    logger.error("Request failed", { ...meta, err })
    return
  }

  logger.info("Request failed", meta)
  logger.debug("Request failed details", { ...meta, err })
}
