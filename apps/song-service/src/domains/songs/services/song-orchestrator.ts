import { createReadStream } from "node:fs"
import { stat } from "node:fs/promises"
import * as path from "node:path"
import type { Clock } from "@cantus/clock"
import type { Logger } from "@cantus/logger"
import type { StoragePort } from "@cantus/storage"
import {
  type ArtifactLocation,
  DEFAULT_INFERENCE_PARAMS,
  type OutputManifest,
  type QueuedJob,
  type SongInput,
  type SongJob,
  SongJobId,
} from "../model/job.model"
import type {
  RepairResult,
  SongArtifact,
  SongStatusView,
  SubmitSongRequest,
  SubmitSongResult,
  WithGenresRequest,
  WithGenresResult,
} from "../model/song.model"
import { JobStateError, NotFoundError, SubmissionError } from "../model/song.errors"
import type { GenreMatcher } from "./genre-matcher"
import type { JobQueue } from "./job-queue"
import type { LyricsService } from "./lyrics-service"
import { contentTypeFor } from "./output-discovery"
import type { RecoveryReport, RecoveryScanner } from "./recovery-scanner"
import type { SongJobStore } from "./song-job-store"

export const DEFAULT_USER_ID = "anonymous"
export const DEFAULT_SONG_NAME = "untitled_song"

export type SongOrchestratorDeps = {
  clock: Clock
  logger: Logger
  store: SongJobStore
  queue: JobQueue<SongJobId>
  lyrics: LyricsService
  genreMatcher: GenreMatcher
  recovery: RecoveryScanner
  /** Used to serve artifacts whose local copy is gone. */
  storage?: StoragePort
}

export type SongOrchestratorOptions = {
  perJobEstimateSeconds: number
  /** Public path of the songs API, used in download instructions. */
  songsPath: string
}

export type RestoreReport = RecoveryReport & {
  loaded: number
  requeued: number
}

type JobExtras = Partial<Pick<QueuedJob, "usedGenres" | "genresWereInferred" | "lyricsProvider">>

type ValidatedGenres = {
  kept: string[]
  invalid: string[]
}

export function toSongInput(request: SubmitSongRequest): SongInput {
  const base = {
    userId: request.userId?.trim() || DEFAULT_USER_ID,
    songName: request.songName?.trim() || DEFAULT_SONG_NAME,
    params: { ...DEFAULT_INFERENCE_PARAMS, ...request.params },
  }
  const genre = request.genre?.trim() || undefined
  const lyrics = request.lyrics?.trim() ? request.lyrics : undefined
  const prompt = request.prompt?.trim() || undefined

  if (genre !== undefined && lyrics !== undefined) {
    return { ...base, source: "explicit", genre, lyrics, ...(prompt !== undefined && { prompt }) }
  }

  if (prompt !== undefined) {
    return {
      ...base,
      source: "prompt",
      prompt,
      ...(genre !== undefined && { genre }),
      ...(lyrics !== undefined && { lyrics }),
    }
  }

  throw SubmissionError.incomplete()
}

/** Existing remote references survive as long as they point at the same local file. */
export function mergeManifest(previous: OutputManifest, discovered: OutputManifest): OutputManifest {
  const merged: OutputManifest = {}

  for (const [key, location] of Object.entries(previous)) {
    if (location.remote) merged[key] = location
  }

  for (const [key, location] of Object.entries(discovered)) {
    const kept = merged[key]
    if (!kept || kept.localPath !== location.localPath) merged[key] = location
  }

  return merged
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

/**
 * Entry point for everything callers do with song jobs. Owns admission
 * into the queue; the worker owns everything after that.
 */
export class SongOrchestrator {
  constructor(
    private readonly deps: SongOrchestratorDeps,
    private readonly opts: SongOrchestratorOptions,
  ) {}

  /**
   * Loads persisted jobs, puts the ones still QUEUED back in line in
   * submission order and repairs completed jobs that lost their manifest.
   */
  async restore(): Promise<RestoreReport> {
    const jobs = await this.deps.store.load()
    const queued = jobs
      .filter((job) => job.status === "queued")
      .sort((a, b) => a.submittedAt.getTime() - b.submittedAt.getTime())

    for (const job of queued) this.deps.queue.enqueue(job.id)

    const recovery = await this.deps.recovery.scan()
    const report = { loaded: jobs.length, requeued: queued.length, ...recovery }

    this.deps.logger.info("Job state restored", {
      loaded: report.loaded,
      requeued: report.requeued,
      repaired: report.repaired.length,
      unresolved: report.unresolved.length,
    })

    return report
  }

  /** @throws {SubmissionError} when neither genre and lyrics nor a prompt is given */
  async submit(request: SubmitSongRequest): Promise<SubmitSongResult> {
    const input = toSongInput(request)
    const needsLyrics = input.source === "prompt" && input.lyrics === undefined
    const provider = needsLyrics ? this.deps.lyrics.activeProviderName : undefined

    return this.admit(input, { ...(provider !== undefined && { lyricsProvider: provider }) })
  }

  /**
   * Writes lyrics for the requested genres (inferring them from the prompt
   * when none are usable) and queues the song.
   *
   * @throws {ProviderError} when lyrics generation fails
   */
  async submitWithGenres(request: WithGenresRequest): Promise<WithGenresResult> {
    const { genres, prompt, ...rest } = request
    const { kept, invalid } = this.validateGenres(genres ?? [])

    const inferred = kept.length === 0
    const usedGenres = inferred ? await this.deps.lyrics.inferGenres(prompt) : kept
    const written = await this.deps.lyrics.writeLyricsWithGenres(prompt, usedGenres)

    const input = toSongInput({
      ...rest,
      prompt,
      genre: usedGenres[0] ?? this.deps.genreMatcher.fallback,
      lyrics: written.lyrics,
    })

    const submitted = await this.admit(input, {
      usedGenres,
      genresWereInferred: inferred,
      lyricsProvider: written.provider,
    })

    const result: WithGenresResult = {
      ...submitted,
      lyrics: written.lyrics,
      usedGenres,
      genresWereInferred: inferred,
      provider: written.provider,
      downloadInstructions: {
        checkStatus: `${this.opts.songsPath}/${submitted.requestId}`,
        downloadWhenReady: `${this.opts.songsPath}/${submitted.requestId}/download`,
        supportedFormats: ["mp3", "wav", "mid"],
      },
    }

    if (inferred) {
      result.genreInfo = {
        message: "Genres were automatically inferred from the prompt",
        inferredGenres: usedGenres,
      }
    } else if (invalid.length > 0) {
      result.warnings = {
        message: "Some genres were not recognized and were omitted.",
        invalidGenres: invalid,
      }
    }

    return result
  }

  /** @throws {NotFoundError} for unknown ids */
  status(id: string): SongStatusView {
    return this.view(this.require(id))
  }

  /**
   * Opens an artifact of a completed job. `type` is a manifest key such as
   * `audio`, or a file extension such as `wav`.
   *
   * @throws {NotFoundError}
   */
  async openArtifact(id: string, type = "audio"): Promise<SongArtifact> {
    const job = this.require(id)
    if (job.status !== "complete") throw NotFoundError.notComplete(job.id, job.status)

    const entries = Object.entries(job.outputManifest).sort(([a], [b]) => a.localeCompare(b))
    if (entries.length === 0) throw NotFoundError.noOutputs(job.id)

    const wanted = type.trim().toLowerCase()
    const extension = `.${wanted.replace(/^\./, "")}`
    const entry =
      (Object.hasOwn(job.outputManifest, wanted) ? job.outputManifest[wanted] : undefined) ??
      entries.find(([, location]) => location.localPath.toLowerCase().endsWith(extension))?.[1]

    if (!entry) {
      throw NotFoundError.artifactType(
        job.id,
        wanted,
        entries.map(([key]) => key),
      )
    }

    const artifact = await this.read(entry)
    if (!artifact) throw NotFoundError.artifactGone(job.id, wanted)

    return artifact
  }

  /**
   * Rebuilds the manifest of a completed job from its output directory.
   *
   * @throws {NotFoundError} when the job is unknown, not complete or has no outputs
   */
  async repair(id: string): Promise<RepairResult> {
    const job = this.require(id)
    if (job.status !== "complete") throw NotFoundError.notComplete(job.id, job.status)

    const discovered = await this.deps.recovery.rediscover(job.id)
    if (!discovered) throw NotFoundError.noOutputs(job.id)

    const result = await this.deps.store.replaceManifest(
      job.id,
      mergeManifest(job.outputManifest, discovered),
    )
    if (result.kind !== "written") throw JobStateError.rejected(job.id, "complete", result)

    this.deps.logger.info("Manifest repaired", {
      jobId: job.id,
      entries: Object.keys(result.job.outputManifest).length,
    })

    return { requestId: job.id, outputManifest: result.job.outputManifest }
  }

  private async admit(input: SongInput, extras: JobExtras): Promise<SubmitSongResult> {
    const job: QueuedJob = {
      id: SongJobId.generate(),
      status: "queued",
      input,
      submittedAt: this.deps.clock.now(),
      ...extras,
    }

    await this.deps.store.insert(job)

    const queuePosition = this.deps.queue.size
    this.deps.queue.enqueue(job.id)

    this.deps.logger.info("Song request queued", {
      jobId: job.id,
      status: job.status,
      source: input.source,
      queuePosition,
    })

    return {
      requestId: job.id,
      status: "queued",
      queuePosition,
      estimatedWaitSeconds: queuePosition * this.opts.perJobEstimateSeconds,
    }
  }

  private validateGenres(genres: readonly string[]): ValidatedGenres {
    const matcher = this.deps.genreMatcher
    const kept: string[] = []
    const invalid: string[] = []

    for (const raw of genres) {
      const genre = raw.toLowerCase()

      if (matcher.isValid(genre)) {
        kept.push(genre)
        continue
      }

      const closest = matcher.match(genre)
      if (closest !== matcher.fallback) kept.push(closest)
      else invalid.push(genre)
    }

    return { kept: [...new Set(kept)], invalid }
  }

  private require(id: string): SongJob {
    const job = SongJobId.is(id) ? this.deps.store.get(id) : undefined
    if (!job) throw NotFoundError.job(id)

    return job
  }

  private view(job: SongJob): SongStatusView {
    const base: SongStatusView = {
      requestId: job.id,
      status: job.status,
      submittedAt: job.submittedAt.toISOString(),
      ...(job.input.genre !== undefined && { genre: job.input.genre }),
      ...(job.input.lyrics !== undefined && { lyrics: job.input.lyrics }),
      ...(job.usedGenres !== undefined && { usedGenres: job.usedGenres }),
      ...(job.genresWereInferred !== undefined && {
        genresWereInferred: job.genresWereInferred,
      }),
      ...(job.lyricsProvider !== undefined && { lyricsProvider: job.lyricsProvider }),
      ...(job.remoteFolder !== undefined && { remoteFolder: job.remoteFolder }),
    }

    switch (job.status) {
      case "queued": {
        const position = this.deps.queue.position(job.id)
        if (position === null) return base

        return {
          ...base,
          queuePosition: position,
          estimatedWaitSeconds: position * this.opts.perJobEstimateSeconds,
        }
      }
      case "complete":
        return {
          ...base,
          startedAt: job.startedAt.toISOString(),
          completedAt: job.completedAt.toISOString(),
          outputManifest: job.outputManifest,
        }
      case "error":
        return {
          ...base,
          ...(job.startedAt !== undefined && { startedAt: job.startedAt.toISOString() }),
          completedAt: job.completedAt.toISOString(),
          error: job.error,
        }
      default:
        return { ...base, startedAt: job.startedAt.toISOString() }
    }
  }

  private async read(location: ArtifactLocation): Promise<SongArtifact | null> {
    try {
      const info = await stat(location.localPath)
      if (info.isFile()) {
        return {
          fileName: path.basename(location.localPath),
          contentType: contentTypeFor(location.localPath),
          sizeInBytes: info.size,
          body: createReadStream(location.localPath),
        }
      }
    } catch (err) {
      if (!isNotFound(err)) throw err
    }

    if (!location.remote || !this.deps.storage) return null

    const object = await this.deps.storage.get(location.remote)
    if (!object) return null

    return {
      fileName: path.posix.basename(location.remote.key),
      contentType: object.contentType ?? contentTypeFor(location.remote.key),
      sizeInBytes: object.sizeInBytes,
      body: object.body,
    }
  }
}
