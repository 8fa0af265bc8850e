import { type ChildProcess, spawn } from "node:child_process"
import { createInterface } from "node:readline"
import type { Readable } from "node:stream"
import type { Clock, Milliseconds } from "@cantus/clock"
import { errorMessage } from "@cantus/errors"
import type { Logger } from "@cantus/logger"
import type {
  InferenceRequest,
  InferenceResult,
  InferenceRunner,
} from "../model/inference.model"

export type InferenceModels = {
  stage1Model: string
  stage2Model: string
}

/**
 * Command line flags for one run. Per-request model paths win over the
 * configured ones; boolean switches appear only when set.
 */
export function buildInferenceArgs(request: InferenceRequest, models: InferenceModels): string[] {
  const p = request.params
  const args = [
    "--genre_txt",
    request.genrePath,
    "--lyrics_txt",
    request.lyricsPath,
    "--output_dir",
    request.outputDir,
    "--stage1_model",
    p.stage1Model ?? models.stage1Model,
    "--stage2_model",
    p.stage2Model ?? models.stage2Model,
    "--stage1_use_exl2",
    "--stage2_use_exl2",
    "--stage2_batch_size",
    String(p.stage2BatchSize),
    "--run_n_segments",
    String(p.runNSegments),
    "--max_new_tokens",
    String(p.maxNewTokens),
    "--repetition_penalty",
    String(p.repetitionPenalty),
    "--stage2_cache_size",
    String(p.stage2CacheSize),
  ]

  if (p.cudaIdx !== undefined) args.push("--cuda_idx", String(p.cudaIdx))
  if (p.stage1CacheSize !== undefined) args.push("--stage1_cache_size", String(p.stage1CacheSize))
  if (p.stage1CacheMode) args.push("--stage1_cache_mode", p.stage1CacheMode)
  if (p.stage2CacheMode) args.push("--stage2_cache_mode", p.stage2CacheMode)

  if (p.stage1NoGuidance) args.push("--stage1_no_guidance")
  if (p.keepIntermediate) args.push("--keep_intermediate")
  if (p.disableOffloadModel) args.push("--disable_offload_model")

  return args
}

export type ProcessInferenceRunnerDeps = {
  clock: Clock
  logger: Logger
}

export type ProcessInferenceRunnerOptions = InferenceModels & {
  /** Executable, e.g. `python3`. */
  command: string
  /** Placed before the generated flags, e.g. the script path. */
  commandArgs: readonly string[]
  cwd?: string
  /** No limit when absent. */
  timeoutMs?: Milliseconds
  /** Delay between SIGTERM and SIGKILL after a timeout. */
  killGraceMs: Milliseconds
}

/**
 * Runs the synthesis engine as a child process and streams its output to
 * the logger line by line.
 */
export class ProcessInferenceRunner implements InferenceRunner {
  constructor(
    private readonly deps: ProcessInferenceRunnerDeps,
    private readonly opts: ProcessInferenceRunnerOptions,
  ) {}

  run(request: InferenceRequest): Promise<InferenceResult> {
    const log = this.deps.logger.child({ jobId: request.jobId, stage: "generating_audio" })
    const args = [...this.opts.commandArgs, ...buildInferenceArgs(request, this.opts)]
    const startedAt = this.deps.clock.nowMs()

    log.info("Starting inference", { command: this.opts.command, args })

    return new Promise<InferenceResult>((resolve, reject) => {
      const child = spawn(this.opts.command, args, {
        ...(this.opts.cwd && { cwd: this.opts.cwd }),
        stdio: ["ignore", "pipe", "pipe"],
      })

      const watchdog = new AbortController()
      let timedOut = false
      let settled = false

      this.pipeLines(child.stdout, "stdout", log)
      this.pipeLines(child.stderr, "stderr", log)

      child.once("error", (err) => {
        watchdog.abort()
        if (settled) return
        settled = true
        reject(err)
      })

      child.once("close", (exitCode, signal) => {
        watchdog.abort()
        if (settled) return
        settled = true

        const result: InferenceResult = {
          exitCode,
          signal,
          timedOut,
          durationMs: this.deps.clock.nowMs() - startedAt,
        }
        log.info("Inference finished", { ...result })
        resolve(result)
      })

      const timeoutMs = this.opts.timeoutMs
      if (timeoutMs !== undefined && timeoutMs > 0) {
        this.enforceTimeout(child, timeoutMs, watchdog.signal, () => {
          timedOut = true
          log.warn("Inference timed out, terminating", { timeoutMs })
        }).catch((err: unknown) => {
          log.error("Inference watchdog failed", { reason: errorMessage(err) })
        })
      }
    })
  }

  private async enforceTimeout(
    child: ChildProcess,
    timeoutMs: Milliseconds,
    signal: AbortSignal,
    onTimeout: () => void,
  ): Promise<void> {
    await this.deps.clock.sleep(timeoutMs, signal)
    if (signal.aborted) return

    onTimeout()
    child.kill("SIGTERM")

    await this.deps.clock.sleep(this.opts.killGraceMs, signal)
    if (signal.aborted) return

    child.kill("SIGKILL")
  }

  private pipeLines(stream: Readable | null, name: "stdout" | "stderr", log: Logger): void {
    if (!stream) return

    createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY }).on("line", (line) => {
      if (line.trim()) log.debug(line, { stream: name })
    })
  }
}
