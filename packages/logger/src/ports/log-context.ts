/**
 * Well-known fields. Anything else may be attached as free-form metadata.
 */
export type LogContext = {
  requestId: string
  method: string
  path: string
  status: number
  durationMs: number

  jobId: string
  stage: string

  service: string
  module: string
  env: string
}

export type LogMeta = Partial<LogContext> & { err?: unknown } & Record<string, unknown>

/**
 * Fields bound to a child logger and repeated on every entry it emits.
 */
export type LogBindings = Partial<LogContext> & Record<string, unknown>
