import type { Clock } from "@cantus/clock"
import { errorMessage } from "@cantus/errors"
import type { Logger } from "@cantus/logger"
import type { InferenceResult, InferenceRunner, JobWorkspace } from "../model/inference.model"
import type {
  ActiveJob,
  ActivePatch,
  JobStatus,
  JobStoreWriteResult,
  SongInput,
  SongJob,
  SongJobId,
} from "../model/job.model"
import { InferenceError, JobStateError } from "../model/song.errors"
import { type ArtifactPublisher, remoteFolderFor } from "./artifact-publisher"
import type { GenreMatcher } from "./genre-matcher"
import type { JobWorkspaces } from "./job-workspace"
import type { LyricsService } from "./lyrics-service"
import { formatLyrics } from "./lyrics-format"
import type { OutputDiscovery } from "./output-discovery"
import type { AdvanceStatus, SongJobStore } from "./song-job-store"

export type SongPipelineDeps = {
  clock: Clock
  logger: Logger
  store: SongJobStore
  lyrics: LyricsService
  genreMatcher: GenreMatcher
  workspaces: JobWorkspaces
  runner: InferenceRunner
  discovery: OutputDiscovery
  publisher: ArtifactPublisher
}

type ResolvedText = {
  genre: string
  lyrics: string
}

/**
 * Drives one job from QUEUED to a terminal state. Every stage change is
 * persisted before the stage's work starts.
 */
export class SongPipeline {
  constructor(private readonly deps: SongPipelineDeps) {}

  /**
   * Never rejects. Failures end the job in ERROR; a job that is not QUEUED
   * is left alone.
   */
  async run(id: SongJobId): Promise<SongJob | undefined> {
    const log = this.deps.logger.child({ jobId: id })

    let claimed: JobStoreWriteResult<ActiveJob>
    try {
      claimed = await this.deps.store.markProcessing(id, this.deps.clock.now())
    } catch (err) {
      log.error("Could not start job", { err })
      return this.deps.store.get(id)
    }

    if (claimed.kind !== "written") {
      log.warn("Skipping job that is not queued", { result: claimed.kind })
      return this.deps.store.get(id)
    }

    log.info("Job started", { status: "processing" })

    try {
      return await this.process(claimed.job, log)
    } catch (err) {
      return this.fail(id, err, log)
    }
  }

  private async process(job: ActiveJob, log: Logger): Promise<SongJob> {
    const { id } = job
    const text = await this.resolveText(job, log)
    const input: SongInput = { ...job.input, ...text }

    await this.advance(id, "generating_audio", { input })

    const genre = this.deps.genreMatcher.match(text.genre)
    const workspace = await this.deps.workspaces.prepare(id, genre, formatLyrics(text.lyrics))
    log.info("Generating audio", { status: "generating_audio", genre, dir: workspace.dir })

    const result = await this.infer(id, input, workspace)
    if (result.exitCode !== 0 || result.timedOut) throw InferenceError.exited(id, result)

    const artifacts = await this.deps.discovery.discover(workspace.dir)
    if (artifacts.length === 0) throw InferenceError.noOutput(id, workspace.dir)

    await this.advance(id, "uploading", {
      ...(this.deps.publisher.uploadsEnabled && { remoteFolder: remoteFolderFor(id, input) }),
    })
    log.info("Publishing artifacts", { status: "uploading", count: artifacts.length })

    const manifest = await this.deps.publisher.publish({ id, input, workspace, artifacts })
    const done = this.expectWritten(
      id,
      "complete",
      await this.deps.store.markComplete(id, this.deps.clock.now(), manifest),
    )

    log.info("Job complete", { status: "complete" })
    return done
  }

  private async resolveText(job: ActiveJob, log: Logger): Promise<ResolvedText> {
    const input = job.input
    if (input.source === "explicit") return { genre: input.genre, lyrics: input.lyrics }

    let lyrics = input.lyrics
    if (!lyrics?.trim()) {
      await this.advance(job.id, "generating_lyrics")
      log.info("Generating lyrics", { status: "generating_lyrics" })

      lyrics = (await this.deps.lyrics.writeLyrics(input.prompt)).lyrics
    }

    let genre = input.genre
    if (!genre?.trim()) {
      genre = (await this.deps.lyrics.suggestGenre(input.prompt)) ?? this.deps.genreMatcher.fallback
      log.info("Genre chosen from prompt", { genre })
    }

    return { genre, lyrics }
  }

  private async infer(
    id: SongJobId,
    input: SongInput,
    workspace: JobWorkspace,
  ): Promise<InferenceResult> {
    try {
      return await this.deps.runner.run({
        jobId: id,
        genrePath: workspace.genrePath,
        lyricsPath: workspace.lyricsPath,
        outputDir: workspace.dir,
        params: input.params,
      })
    } catch (err) {
      throw InferenceError.spawnFailed(id, err)
    }
  }

  private async advance(
    id: SongJobId,
    status: AdvanceStatus,
    patch: ActivePatch = {},
  ): Promise<ActiveJob> {
    return this.expectWritten(id, status, await this.deps.store.advance(id, status, patch))
  }

  private expectWritten<J extends SongJob>(
    id: SongJobId,
    target: JobStatus,
    result: JobStoreWriteResult<J>,
  ): J {
    if (result.kind !== "written") throw JobStateError.rejected(id, target, result)
    return result.job
  }

  private async fail(id: SongJobId, err: unknown, log: Logger): Promise<SongJob | undefined> {
    const message = errorMessage(err)
    log.error("Job failed", { status: "error", err })

    try {
      const result = await this.deps.store.markFailed(id, this.deps.clock.now(), message)
      if (result.kind === "written") return result.job

      log.warn("Could not record job failure", { result: result.kind })
    } catch (saveErr) {
      log.error("Could not persist job failure", { err: saveErr })
    }

    return this.deps.store.get(id)
  }
}
