import "./types/context"

export { isValidationError, parseOrThrow, ValidationError } from "./errors/validation"
export type { ValidationIssue } from "./errors/validation"
export type { ErrorMapping, ErrorMappingsConfig, ErrorResponse } from "./errors/errors"
export type { StatusCode } from "./http/status-codes"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type { LifecycleHook, LifecycleHookContext } from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export {
  type Application,
  type Context,
  createRouter,
  createServer,
  type Middleware,
  type RequestHandler,
  type Router,
  Server,
  ServerStartError,
} from "./server/server"
export type { ReadinessCheck, ServerDependencies, ServerOptions } from "./server/server-options"
