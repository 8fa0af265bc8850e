import type { Logger } from "@cantus/logger"
import { Hono } from "hono"
import { mock } from "vitest-mock-extended"
import "../../types/context"
import { requestLoggingMiddleware } from "../request-logging"

describe("requestLoggingMiddleware", () => {
  function build(logger: Logger) {
    const app = new Hono()

    app.use("*", requestLoggingMiddleware({ enabled: true, level: "info", ignorePaths: ["/health"] }, logger))
    app.get("/songs/:id", (c) => c.json({ ok: true }))
    app.get("/boom", (c) => c.json({ ok: false }, 500))
    app.get("/health", (c) => c.json({ ok: true }))

    return app
  }

  it("logs completed requests at the configured level", async () => {
    const logger = mock<Logger>()

    await build(logger).request("/songs/abc", { headers: { "user-agent": "probe" } })

    expect(logger.info).toHaveBeenCalledWith(
      "Request completed",
      expect.objectContaining({
        method: "GET",
        path: "/songs/abc",
        status: 200,
        userAgent: "probe",
      }),
    )
  })

  it("logs 5xx responses at error", async () => {
    const logger = mock<Logger>()

    await build(logger).request("/boom")

    expect(logger.error).toHaveBeenCalledWith(
      "Request completed",
      expect.objectContaining({ status: 500 }),
    )
    expect(logger.info).not.toHaveBeenCalled()
  })

  it("skips ignored paths", async () => {
    const logger = mock<Logger>()

    await build(logger).request("/health")

    expect(logger.info).not.toHaveBeenCalled()
  })
})
