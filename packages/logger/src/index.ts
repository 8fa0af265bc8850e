export type { LogBindings, LogContext, LogMeta } from "./ports/log-context"
export { isLogLevelName, logLevelNames } from "./ports/log-level"
export type { LogLevelName } from "./ports/log-level"
export type { Logger, LoggerOptions } from "./ports/logger"
export { PinoLogger } from "./adapters/pino/pino-logger"
export type { PinoLoggerDeps } from "./adapters/pino/pino-logger"
export { NullLogger } from "./adapters/null/null-logger"
