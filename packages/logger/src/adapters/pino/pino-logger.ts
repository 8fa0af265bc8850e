import pino, {
  type DestinationStream,
  type Logger as PinoBase,
  type LoggerOptions as PinoOptions,
} from "pino"
import { errWithCause } from "pino-std-serializers"
import type { LogBindings, LogMeta } from "../../ports/log-context"
import type { Logger, LoggerOptions } from "../../ports/logger"

export type PinoLoggerDeps = {
  /** Ignored when `prettify` is on, since pino-pretty owns the output then. */
  destination?: DestinationStream
}

export class PinoLogger implements Logger {
  protected readonly logger: PinoBase

  constructor(
    private readonly deps: PinoLoggerDeps = {},
    private readonly opts: Partial<LoggerOptions> = {},
    bindings: LogBindings = {},
    base?: PinoBase,
  ) {
    this.logger = base ? base.child(bindings) : this.root().child(bindings)
  }

  private root(): PinoBase {
    const pinoOpts: PinoOptions = {
      ...(this.opts.level && { level: this.opts.level }),
      serializers: { err: errWithCause },
      ...(this.opts.prettify && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      }),
    }

    if (!this.opts.prettify && this.deps.destination) {
      return pino(pinoOpts, this.deps.destination)
    }
    return pino(pinoOpts)
  }

  trace(message: string, meta: LogMeta = {}): void {
    this.logger.trace(meta, message)
  }

  debug(message: string, meta: LogMeta = {}): void {
    this.logger.debug(meta, message)
  }

  info(message: string, meta: LogMeta = {}): void {
    this.logger.info(meta, message)
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.logger.warn(meta, message)
  }

  error(message: string, meta: LogMeta = {}): void {
    this.logger.error(meta, message)
  }

  fatal(message: string, meta: LogMeta = {}): void {
    this.logger.fatal(meta, message)
  }

  child(bindings: LogBindings): Logger {
    return new PinoLogger(this.deps, this.opts, bindings, this.logger)
  }
}
