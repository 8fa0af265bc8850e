import type { Context } from "hono"
import type { Middleware } from "../server/server"
import type { ResolvedRequestIdConfig } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

type EnabledConfig = Extract<ResolvedRequestIdConfig, { enabled: true }>

const TRACE_ID = /^[0-9a-f]{32}$/i

/** Returns the trace-id of a W3C `traceparent` value, or null. */
export function traceIdFromTraceparent(traceparent: string): string | null {
  const [, traceId] = traceparent.split("-")

  if (!traceId || !TRACE_ID.test(traceId) || /^0+$/.test(traceId)) return null

  return traceId
}

function resolveRequestId(c: Context, config: EnabledConfig): string {
  const existing = c.get("requestId")
  if (isNonEmptyString(existing)) return existing

  const fromHeader = c.req.header(config.header)
  if (isNonEmptyString(fromHeader)) return fromHeader

  const traceparent = config.fallbackToTraceparent ? c.req.header("traceparent") : undefined
  const traceId = traceparent ? traceIdFromTraceparent(traceparent) : null

  return traceId ?? config.generate()
}

/** Sets `requestId` on the context and echoes it in the response header. */
export function requestIdMiddleware(config: EnabledConfig): Middleware {
  return async (c, next) => {
    const requestId = resolveRequestId(c, config)
    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, config.header.toLowerCase(), requestId)
  }
}
