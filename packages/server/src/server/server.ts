import { BaseError } from "@cantus/errors"
import { type Handler, Hono, type Context as HonoContext, type MiddlewareHandler } from "hono"
import "../types/context"
import { type CreateErrorHandlerFn, createErrorHandler } from "../errors/create-error-handler"
import { type BuildAppFn, buildApp } from "../lifecycle/build-app"
import { type CreateStopperFn, createStopper, type ServerHandle } from "../lifecycle/create-stopper"
import { type ListenFn, listen } from "../lifecycle/listen"
import { type ShutdownFn, type StopResult, shutdown } from "../lifecycle/shutdown"
import {
  type SetupProcessHandlersFn,
  type SignalHandler,
  setupProcessHandlers,
} from "../lifecycle/signals"
import { type StartResult, type StartupFn, startup } from "../lifecycle/startup"
import {
  type CreateDefaultMiddlewareFn,
  createDefaultMiddleware,
} from "../middleware/create-default-middleware"
import {
  type ResolvedServerOptions,
  resolveOptions,
  type ServerDependencies,
  type ServerOptions,
} from "./server-options"

export type Application = Hono
export type Router = Hono
export type Context = HonoContext
export type Middleware = MiddlewareHandler
export type RequestHandler = Handler
export type ServerState = "idle" | "starting" | "started"

export interface ServerCollaborators {
  onStartup: StartupFn
  onShutdown: ShutdownFn
  listen: ListenFn
  buildApp: BuildAppFn
  createStopper: CreateStopperFn
  setupProcessHandlers: SetupProcessHandlersFn
  createDefaultMiddleware: CreateDefaultMiddlewareFn
  createErrorHandler: CreateErrorHandlerFn
}

const defaultCollaborators: ServerCollaborators = {
  onStartup: startup,
  onShutdown: shutdown,
  listen,
  buildApp,
  createStopper,
  setupProcessHandlers,
  createDefaultMiddleware,
  createErrorHandler,
}

export function createApp(): Application {
  return new Hono()
}

export function createRouter(): Router {
  return new Hono()
}

export class ServerStartError extends BaseError<"server_start_failed"> {
  static fromResult(result: StartResult): ServerStartError {
    const first = result.failures[0]

    return new ServerStartError(
      result.timedOut ? "Server startup timed out" : "Server startup hooks failed",
      {
        code: "server_start_failed",
        context: { hooks: result.failures.map((f) => f.hook), timedOut: result.timedOut },
        ...(first && { cause: first.error }),
      },
    )
  }
}

/**
 * Hono app plus lifecycle: startup hooks, listen, graceful stop and signal
 * handling. `build()` wires routes without listening, for in-process tests.
 */
export class Server {
  readonly app: Application

  private state: ServerState = "idle"
  private built = false
  private ready = false
  private running?: ServerHandle
  private signalHandler?: SignalHandler

  constructor(
    private readonly deps: ServerDependencies,
    private readonly options: ResolvedServerOptions,
    private readonly collabs: ServerCollaborators = defaultCollaborators,
  ) {
    this.app = options.createApp ? options.createApp() : createApp()
  }

  setupProcessHandlers(): this {
    if (this.signalHandler) return this

    this.signalHandler = this.collabs.setupProcessHandlers({
      logger: this.deps.logger,
      stop: () => (this.running ? this.running.stop() : this.noopStop()),
    })

    return this
  }

  build(): Application {
    if (this.built) return this.app

    this.collabs.buildApp({
      app: this.app,
      options: this.options,
      isReady: () => this.ready,
      errorHandler: this.collabs.createErrorHandler(this.options, this.deps.logger),
      defaultMiddleware: this.collabs.createDefaultMiddleware(this.options, this.deps.logger),
    })
    this.built = true

    return this.app
  }

  async start(): Promise<ServerHandle> {
    if (this.state !== "idle") throw new Error("Server already started")

    this.state = "starting"

    try {
      const started = await this.collabs.onStartup({
        clock: this.deps.clock,
        logger: this.deps.logger,
        deadlineMs: this.deps.clock.nowMs() + this.options.startupTimeoutMs,
        startHooks: this.options.startHooks,
      })

      if (!started.ok) throw ServerStartError.fromResult(started)

      const listener = this.collabs.listen(this.build(), this.options, this.deps.logger)

      const handle = this.collabs.createStopper({
        server: listener,
        deps: this.deps,
        options: this.options,
        stopHooks: this.options.stopHooks,
        shutdown: this.collabs.onShutdown,
        setReady: (value) => {
          this.ready = value
        },
        onStop: () => this.signalHandler?.unregister(),
      })

      this.running = handle
      this.ready = true
      this.state = "started"

      return handle
    } catch (err) {
      this.state = "idle"
      this.ready = false

      throw err
    }
  }

  getState(): ServerState {
    return this.state
  }

  isReady(): boolean {
    return this.ready
  }

  private noopStop(): Promise<StopResult> {
    this.deps.logger.warn("Stop called but server not running")

    return Promise.resolve({ ok: true, failures: [], timedOut: false })
  }
}

export function createServer(deps: ServerDependencies, options: ServerOptions): Server {
  return new Server(deps, resolveOptions(options))
}
