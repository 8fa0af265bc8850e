export type ErrorCode = Lowercase<string>

/**
 * Structured data carried alongside an error (ids, paths, exit codes).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` when trying the same operation again could succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, a missing file, a
   * provider outage). `false` for programmer errors and broken invariants.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape used in logs and job records.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
