import type { Mutex } from "../../../lib"
import {
  type ActiveJob,
  type ActivePatch,
  type CompletedJob,
  canTransition,
  type FailedJob,
  isActive,
  isTerminal,
  type JobStatus,
  type JobStoreWriteResult,
  type OutputManifest,
  type QueuedJob,
  type ResultStore,
  type SongJob,
  type SongJobId,
  sourcesOf,
} from "../model/job.model"
import { JobStateError } from "../model/song.errors"

export type SongJobStoreDeps = {
  resultStore: ResultStore
  /** Shared with every other writer of orchestration state. */
  mutex: Mutex
}

export type AdvanceStatus = "generating_lyrics" | "generating_audio" | "uploading"

type PendingJob = QueuedJob | ActiveJob

const isQueued = (job: SongJob): job is QueuedJob => job.status === "queued"
const isPending = (job: SongJob): job is PendingJob => !isTerminal(job)
const isCompleted = (job: SongJob): job is CompletedJob => job.status === "complete"

/**
 * In-memory job map backed by a {@link ResultStore}. Every write saves the
 * full next snapshot first and only then replaces the in-memory map, so a
 * failed save leaves both unchanged.
 */
export class SongJobStore {
  private jobs: ReadonlyMap<SongJobId, SongJob> = new Map()

  constructor(private readonly deps: SongJobStoreDeps) {}

  async load(): Promise<SongJob[]> {
    return this.deps.mutex.run(async () => {
      this.jobs = await this.deps.resultStore.load()
      return [...this.jobs.values()]
    })
  }

  get(id: SongJobId): SongJob | undefined {
    return this.jobs.get(id)
  }

  list(): SongJob[] {
    return [...this.jobs.values()]
  }

  get size(): number {
    return this.jobs.size
  }

  /** @throws {JobStateError} when the id is already taken */
  async insert(job: QueuedJob): Promise<void> {
    await this.deps.mutex.run(async () => {
      if (this.jobs.has(job.id)) throw JobStateError.duplicate(job.id)

      await this.commit(job)
    })
  }

  async markProcessing(id: SongJobId, at: Date): Promise<JobStoreWriteResult<ActiveJob>> {
    return this.write<QueuedJob, ActiveJob>(id, sourcesOf("processing"), isQueued, (job) => ({
      ...job,
      status: "processing",
      startedAt: at,
    }))
  }

  async advance(
    id: SongJobId,
    status: AdvanceStatus,
    patch: ActivePatch = {},
  ): Promise<JobStoreWriteResult<ActiveJob>> {
    const accepts = (job: SongJob): job is ActiveJob =>
      isActive(job) && canTransition(job.status, status)

    return this.write<ActiveJob, ActiveJob>(id, sourcesOf(status), accepts, (job) => ({
      ...job,
      ...patch,
      status,
    }))
  }

  async markComplete(
    id: SongJobId,
    at: Date,
    outputManifest: OutputManifest,
  ): Promise<JobStoreWriteResult<CompletedJob>> {
    const accepts = (job: SongJob): job is ActiveJob =>
      isActive(job) && canTransition(job.status, "complete")

    return this.write<ActiveJob, CompletedJob>(id, sourcesOf("complete"), accepts, (job) => ({
      ...job,
      status: "complete",
      completedAt: at,
      outputManifest,
    }))
  }

  async markFailed(
    id: SongJobId,
    at: Date,
    error: string,
  ): Promise<JobStoreWriteResult<FailedJob>> {
    return this.write<PendingJob, FailedJob>(id, sourcesOf("error"), isPending, (job) => ({
      ...job,
      status: "error",
      completedAt: at,
      error,
    }))
  }

  /** Rewrites the manifest of a completed job. Status and timestamps are kept. */
  async replaceManifest(
    id: SongJobId,
    outputManifest: OutputManifest,
  ): Promise<JobStoreWriteResult<CompletedJob>> {
    return this.write<CompletedJob, CompletedJob>(id, ["complete"], isCompleted, (job) => ({
      ...job,
      outputManifest,
    }))
  }

  private async write<S extends SongJob, J extends SongJob>(
    id: SongJobId,
    expected: readonly JobStatus[],
    accepts: (job: SongJob) => job is S,
    build: (job: S) => J,
  ): Promise<JobStoreWriteResult<J>> {
    return this.deps.mutex.run<JobStoreWriteResult<J>>(async () => {
      const current = this.jobs.get(id)
      if (!current) return { kind: "not_found" }

      if (!accepts(current)) {
        return { kind: "invalid_transition", expected, actual: current.status }
      }

      const next = build(current)
      await this.commit(next)

      return { kind: "written", job: next }
    })
  }

  private async commit(job: SongJob): Promise<void> {
    const next = new Map(this.jobs)
    next.set(job.id, job)

    await this.deps.resultStore.save(next)
    this.jobs = next
  }
}
