import { Hono } from "hono"
import type { ResolvedHealthConfig } from "../../server/server-options"
import { registerHealthRoutes } from "../health"

function config(overrides: Partial<Extract<ResolvedHealthConfig, { enabled: true }>> = {}) {
  return {
    enabled: true as const,
    livenessPath: "/health" as const,
    readinessPath: "/ready" as const,
    readinessChecks: [],
    checkTimeoutMs: 5_000,
    ...overrides,
  }
}

describe("registerHealthRoutes", () => {
  it("registers nothing when disabled", async () => {
    const app = new Hono()
    registerHealthRoutes(app, { enabled: false }, () => true)

    expect((await app.request("/health")).status).toBe(404)
  })

  it("answers liveness without caching", async () => {
    const app = new Hono()
    registerHealthRoutes(app, config(), () => false)

    const res = await app.request("/health")

    expect(res.status).toBe(200)
    expect(await res.json()).toStrictEqual({ ok: true })
    expect(res.headers.get("cache-control")).toBe("no-store, no-cache, must-revalidate")
  })

  it("reports starting until the server is ready", async () => {
    let ready = false
    const app = new Hono()
    registerHealthRoutes(app, config(), () => ready)

    const before = await app.request("/ready")
    ready = true
    const after = await app.request("/ready")

    expect(before.status).toBe(503)
    expect(await before.json()).toStrictEqual({ ok: false, reason: "starting" })
    expect(after.status).toBe(200)
  })

  it("fails readiness with the name of a failing check", async () => {
    const app = new Hono()
    registerHealthRoutes(
      app,
      config({
        readinessChecks: [
          { name: "result-store", fn: async () => true },
          { name: "worker", fn: async () => false },
        ],
      }),
      () => true,
    )

    const res = await app.request("/ready")

    expect(res.status).toBe(503)
    expect(await res.json()).toStrictEqual({ ok: false, reason: "worker" })
  })

  it("reports a throwing check as an error", async () => {
    const app = new Hono()
    registerHealthRoutes(
      app,
      config({
        readinessChecks: [
          {
            name: "worker",
            fn: async () => {
              throw new Error("down")
            },
          },
        ],
      }),
      () => true,
    )

    expect(await (await app.request("/ready")).json()).toStrictEqual({
      ok: false,
      reason: "worker:error",
    })
  })
})
