import { BaseError, type ErrorContext } from "@cantus/errors"
import type { z } from "zod/mini"

export type ValidationIssue = { path: string; message: string }

export type ValidationErrorContext = ErrorContext & {
  issues: ValidationIssue[]
}

type IssueLike = { path: readonly PropertyKey[]; message: string }

function formatPath(path: readonly PropertyKey[]): string {
  let out = ""

  for (const part of path) {
    if (typeof part === "number") out += `[${part}]`
    else out += out ? `.${String(part)}` : String(part)
  }

  return out
}

/** Rejected request input. Never becomes a job. */
export class ValidationError extends BaseError<"validation_error"> {
  static fromIssues(issues: readonly IssueLike[]): ValidationError {
    const formatted = issues.map((i) => ({ path: formatPath(i.path), message: i.message }))

    return new ValidationError(formatted[0]?.message ?? "Invalid input", {
      code: "validation_error",
      context: { issues: formatted },
      isRetryable: false,
    })
  }

  static field(path: string, message: string): ValidationError {
    return new ValidationError(message, {
      code: "validation_error",
      context: { issues: [{ path, message }] },
      isRetryable: false,
    })
  }
}

export function parseOrThrow<T>(schema: z.ZodMiniType<T>, data: unknown): T {
  const result = schema.safeParse(data)

  if (!result.success) throw ValidationError.fromIssues(result.error.issues)

  return result.data
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError && Array.isArray(err.context["issues"])
}
