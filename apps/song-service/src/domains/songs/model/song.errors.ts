import { BaseError, errorMessage } from "@cantus/errors"
import type { InferenceResult } from "./inference.model"
import type {
  JobStatus,
  JobStoreInvalidTransition,
  JobStoreNotFound,
  SongJobId,
} from "./job.model"
import type { ProviderName } from "./lyrics.model"

export type ProviderErrorCode = "provider_failed" | "provider_unavailable"

export class ProviderError extends BaseError<ProviderErrorCode> {
  static requestFailed(provider: ProviderName, operation: string, cause: unknown): ProviderError {
    return new ProviderError(`${provider} ${operation} failed: ${errorMessage(cause)}`, {
      code: "provider_failed",
      context: { provider, operation },
      cause,
      isRetryable: true,
    })
  }

  static emptyResponse(provider: ProviderName, operation: string): ProviderError {
    return new ProviderError(`${provider} ${operation} returned no text`, {
      code: "provider_failed",
      context: { provider, operation },
      isRetryable: true,
    })
  }

  static notConfigured(provider: ProviderName): ProviderError {
    return new ProviderError(`Provider ${provider} has no API key configured`, {
      code: "provider_unavailable",
      context: { provider },
    })
  }

  static noneActive(): ProviderError {
    return new ProviderError("No lyrics provider is configured", {
      code: "provider_unavailable",
    })
  }
}

export class InferenceError extends BaseError<"inference_failed"> {
  static exited(jobId: SongJobId, result: InferenceResult): InferenceError {
    return new InferenceError(describeExit(result), {
      code: "inference_failed",
      context: {
        jobId,
        exitCode: result.exitCode,
        signal: result.signal,
        timedOut: result.timedOut,
      },
    })
  }

  static noOutput(jobId: SongJobId, outputDir: string): InferenceError {
    return new InferenceError("Inference exited cleanly but produced no output files", {
      code: "inference_failed",
      context: { jobId, outputDir },
    })
  }

  static spawnFailed(jobId: SongJobId, cause: unknown): InferenceError {
    return new InferenceError(`Could not start inference: ${errorMessage(cause)}`, {
      code: "inference_failed",
      context: { jobId },
      cause,
    })
  }
}

function describeExit(result: InferenceResult): string {
  if (result.timedOut) return `Inference timed out after ${result.durationMs} ms`
  if (result.signal) return `Inference was killed by ${result.signal}`
  return `Inference failed with exit code ${result.exitCode}`
}

export class UploadError extends BaseError<"upload_failed"> {
  static allFailed(jobId: SongJobId, folder: string, artifacts: string[]): UploadError {
    return new UploadError("Failed to upload any artifact", {
      code: "upload_failed",
      context: { jobId, folder, artifacts },
      isRetryable: true,
    })
  }

  static noAudio(jobId: SongJobId, outputDir: string): UploadError {
    return new UploadError("No audio file found in output directory", {
      code: "upload_failed",
      context: { jobId, outputDir },
    })
  }
}

export type NotFoundErrorCode = "job_not_found" | "artifact_not_found"

export class NotFoundError extends BaseError<NotFoundErrorCode> {
  static job(id: string): NotFoundError {
    return new NotFoundError(`Request ${id} not found`, {
      code: "job_not_found",
      context: { jobId: id },
    })
  }

  static notComplete(id: SongJobId, status: JobStatus): NotFoundError {
    return new NotFoundError(`Request ${id} is not complete (status: ${status})`, {
      code: "artifact_not_found",
      context: { jobId: id, status },
    })
  }

  static noOutputs(id: SongJobId): NotFoundError {
    return new NotFoundError("No output files found for this request", {
      code: "artifact_not_found",
      context: { jobId: id },
    })
  }

  static artifactType(id: SongJobId, type: string, available: string[]): NotFoundError {
    return new NotFoundError(
      `No ${type} file found for this request. Available types: ${available.join(", ")}`,
      {
        code: "artifact_not_found",
        context: { jobId: id, type, available },
      },
    )
  }

  static artifactGone(id: SongJobId, type: string): NotFoundError {
    return new NotFoundError(`The ${type} file for this request is no longer available`, {
      code: "artifact_not_found",
      context: { jobId: id, type },
    })
  }
}

export class JobStateError extends BaseError<"invalid_job_state"> {
  static rejected(
    jobId: SongJobId,
    target: JobStatus,
    result: JobStoreNotFound | JobStoreInvalidTransition,
  ): JobStateError {
    const detail =
      result.kind === "not_found" ? "job is missing" : `job is ${result.actual}`

    return new JobStateError(`Cannot move job to ${target}: ${detail}`, {
      code: "invalid_job_state",
      context: {
        jobId,
        target,
        ...(result.kind === "invalid_transition" && {
          actual: result.actual,
          expected: result.expected,
        }),
      },
      isOperational: false,
    })
  }

  static duplicate(jobId: SongJobId): JobStateError {
    return new JobStateError(`Job ${jobId} already exists`, {
      code: "invalid_job_state",
      context: { jobId },
      isOperational: false,
    })
  }
}

export class SubmissionError extends BaseError<"invalid_submission"> {
  static incomplete(): SubmissionError {
    return new SubmissionError("Provide both genre and lyrics, or a prompt", {
      code: "invalid_submission",
    })
  }
}
