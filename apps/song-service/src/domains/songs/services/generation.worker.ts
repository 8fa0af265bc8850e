import type { Logger } from "@cantus/logger"
import type { SongJob, SongJobId } from "../model/job.model"
import type { JobQueue } from "./job-queue"

export type JobRunner = {
  /** Must not reject; failures are recorded on the job. */
  run(id: SongJobId): Promise<SongJob | undefined>
}

export type GenerationWorkerDeps = {
  queue: JobQueue<SongJobId>
  pipeline: JobRunner
  logger: Logger
}

/**
 * Single consumer of the job queue. Jobs run strictly one after another;
 * the worker sleeps on the queue between them.
 */
export class GenerationWorker {
  private controller: AbortController | undefined
  private loop: Promise<void> | undefined

  constructor(private readonly deps: GenerationWorkerDeps) {}

  get running(): boolean {
    return this.loop !== undefined
  }

  async start(): Promise<void> {
    if (this.loop) return

    const controller = new AbortController()
    this.controller = controller
    this.loop = this.runLoop(controller.signal)

    this.deps.logger.info("Generation worker started")
  }

  /** Stops taking jobs and waits for the one in progress to finish. */
  async stop(): Promise<void> {
    const loop = this.loop
    if (!loop) return

    this.controller?.abort(new Error("Generation worker stopping"))
    await loop

    this.loop = undefined
    this.controller = undefined
    this.deps.logger.info("Generation worker stopped")
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let id: SongJobId

      try {
        id = await this.deps.queue.take(signal)
      } catch (err) {
        if (signal.aborted) return
        throw err
      }

      try {
        await this.deps.pipeline.run(id)
      } catch (err) {
        this.deps.logger.error("Job runner rejected", { jobId: id, err })
      }
    }
  }
}
