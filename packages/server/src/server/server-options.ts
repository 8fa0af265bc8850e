import { randomUUID } from "node:crypto"
import type { Clock, Milliseconds } from "@cantus/clock"
import type { Logger, LogLevelName } from "@cantus/logger"
import type { ErrorHandler } from "../errors/create-error-handler"
import type { ErrorMappingsConfig } from "../errors/errors"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import type { Application, Middleware } from "./server"

export type PathString = `/${string}`

export interface DisabledConfig {
  enabled: false
}

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

export interface EnabledRequestIdConfig {
  enabled: true

  /** @default "x-request-id" */
  header?: string

  /**
   * Use the trace-id of an incoming `traceparent` header when the request id
   * header is absent.
   * @default false
   */
  fallbackToTraceparent?: boolean

  /** @default crypto.randomUUID */
  generate?: () => string
}

export interface EnabledRequestLoggingConfig {
  enabled: true

  /**
   * Level for completed requests. 5xx always log at `error`.
   * @default "info"
   */
  level?: LogLevelName

  /** @default the health paths when health routes are enabled */
  ignorePaths?: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface EnabledHealthConfig {
  enabled: true

  /** @default "/health" */
  livenessPath?: PathString

  /** @default "/ready" */
  readinessPath?: PathString

  readinessChecks?: ReadinessCheck[]

  /** @default 5_000 */
  checkTimeoutMs?: Milliseconds
}

export type ErrorHandling =
  | { kind: "handler"; errorHandler: ErrorHandler }
  | { kind: "mappings"; config: ErrorMappingsConfig }

export type RequestIdConfig = DisabledConfig | EnabledRequestIdConfig
export type RequestLoggingConfig = DisabledConfig | EnabledRequestLoggingConfig
export type HealthConfig = DisabledConfig | EnabledHealthConfig

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /** @default the largest timer delay, i.e. no limit */
  startupTimeoutMs?: Milliseconds

  /** @default 10_000 */
  shutdownTimeoutMs?: Milliseconds

  requestId?: RequestIdConfig
  requestLogging?: RequestLoggingConfig
  health?: HealthConfig

  errorHandling: ErrorHandling

  createApp?: () => Application
  routes: (app: Application) => void

  middleware?: {
    pre?: Middleware[]
    post?: Middleware[]
  }

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig = DisabledConfig | Required<EnabledRequestIdConfig>
export type ResolvedRequestLoggingConfig = DisabledConfig | Required<EnabledRequestLoggingConfig>
export type ResolvedHealthConfig = DisabledConfig | Required<EnabledHealthConfig>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  errorHandling: ErrorHandling
  createApp?: () => Application
  routes: (app: Application) => void
  middleware: { pre: Middleware[]; post: Middleware[] }
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export const DEFAULTS = {
  host: "0.0.0.0",
  startupTimeoutMs: 2_147_483_647,
  shutdownTimeoutMs: 10_000,
  requestId: {
    enabled: true,
    header: "x-request-id",
    fallbackToTraceparent: false,
    generate: () => randomUUID(),
  },
  requestLoggingLevel: "info",
  health: {
    enabled: true,
    livenessPath: "/health",
    readinessPath: "/ready",
    readinessChecks: [],
    checkTimeoutMs: 5_000,
  },
} satisfies {
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: Required<EnabledRequestIdConfig>
  requestLoggingLevel: LogLevelName
  health: Required<EnabledHealthConfig>
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealth(options.health)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveRequestId(options.requestId),
    requestLogging: resolveRequestLogging(options.requestLogging, health),
    health,
    errorHandling: options.errorHandling,
    routes: options.routes,
    ...(options.createApp && { createApp: options.createApp }),
    middleware: {
      pre: options.middleware?.pre ?? [],
      post: options.middleware?.post ?? [],
    },
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

function resolveHealth(health: HealthConfig | undefined): ResolvedHealthConfig {
  if (health?.enabled === false) return { enabled: false }

  return {
    livenessPath: health?.livenessPath ?? DEFAULTS.health.livenessPath,
    readinessPath: health?.readinessPath ?? DEFAULTS.health.readinessPath,
    readinessChecks: health?.readinessChecks ?? [],
    checkTimeoutMs: health?.checkTimeoutMs ?? DEFAULTS.health.checkTimeoutMs,
    enabled: true,
  }
}

function resolveRequestId(requestId: RequestIdConfig | undefined): ResolvedRequestIdConfig {
  if (requestId?.enabled === false) return { enabled: false }

  return {
    header: requestId?.header ?? DEFAULTS.requestId.header,
    fallbackToTraceparent:
      requestId?.fallbackToTraceparent ?? DEFAULTS.requestId.fallbackToTraceparent,
    generate: requestId?.generate ?? DEFAULTS.requestId.generate,
    enabled: true,
  }
}

function resolveRequestLogging(
  requestLogging: RequestLoggingConfig | undefined,
  health: ResolvedHealthConfig,
): ResolvedRequestLoggingConfig {
  if (requestLogging?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    level: requestLogging?.level ?? DEFAULTS.requestLoggingLevel,
    ignorePaths:
      requestLogging?.ignorePaths ??
      (health.enabled ? [health.livenessPath, health.readinessPath] : []),
  }
}
