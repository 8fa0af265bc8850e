import { type AppError, type ErrorCode, isAppError } from "@cantus/errors"
import type { StatusCode } from "../http/status-codes"

export type ErrorMapping = {
  status: StatusCode

  /** User-facing message. Must not leak internals. */
  message?: string
}

export type FallbackMapping = Required<ErrorMapping> & {
  code: ErrorCode
}

export type ErrorContextTransformer = (
  error: AppError,
) => Record<string, unknown> | undefined

export interface ErrorMappingsConfig {
  /**
   * Error code to status. A mapping without `message` exposes the error's own
   * message; unmapped `AppError`s keep their code but take the fallback
   * status and message.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  fallback?: FallbackMapping

  /** Extra fields merged into the response body. Return undefined for none. */
  transformContext?: ErrorContextTransformer
}

export type ErrorResponseBody = {
  status: StatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error, requestId) => {
    if (!isAppError(error)) {
      return {
        error: {
          code: fallback.code,
          status: fallback.status,
          message: fallback.message,
          requestId,
        },
      }
    }

    const mapping = config.mappings[error.code]
    const extra = safeTransform(config, error)

    return {
      error: {
        ...extra,
        code: error.code,
        status: mapping?.status ?? fallback.status,
        message: mapping ? (mapping.message ?? error.message) : fallback.message,
        requestId,
      },
    }
  }
}

function safeTransform(
  config: ErrorMappingsConfig,
  error: AppError,
): Record<string, unknown> | undefined {
  try {
    return config.transformContext?.(error)
  } catch {
    return undefined
  }
}
