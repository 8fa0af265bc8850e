import type { NotFoundHandler } from "hono"

export const notFoundHandler: NotFoundHandler = (c) =>
  c.json(
    {
      error: {
        status: 404,
        code: "route_not_found",
        message: `No route for ${c.req.method} ${c.req.path}`,
        requestId: c.get("requestId") ?? "unknown",
      },
    },
    404,
  )
