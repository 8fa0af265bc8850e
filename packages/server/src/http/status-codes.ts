import type { ContentfulStatusCode } from "hono/utils/http-status"

export type StatusCode = ContentfulStatusCode
