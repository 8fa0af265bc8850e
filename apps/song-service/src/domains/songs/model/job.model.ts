import { type Brand, isUuid, stringIdType, uuidV4, withGenerator } from "@cantus/id"
import type { ObjectRef } from "@cantus/storage"
import type { ProviderName } from "./lyrics.model"

export type SongJobId = Brand<string, "SongJobId">
export const SongJobId = withGenerator(
  stringIdType<SongJobId>("SongJobId", (v) => isUuid(v, 4)),
  uuidV4,
)

export const jobStatuses = [
  "queued",
  "processing",
  "generating_lyrics",
  "generating_audio",
  "uploading",
  "complete",
  "error",
] as const

export type JobStatus = (typeof jobStatuses)[number]
export type ActiveStatus = "processing" | "generating_lyrics" | "generating_audio" | "uploading"

const transitions: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["processing", "error"],
  processing: ["generating_lyrics", "generating_audio", "error"],
  generating_lyrics: ["generating_audio", "error"],
  generating_audio: ["uploading", "error"],
  uploading: ["complete", "error"],
  complete: [],
  error: [],
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return transitions[from].includes(to)
}

/** Statuses from which `to` can be reached. */
export function sourcesOf(to: JobStatus): JobStatus[] {
  return jobStatuses.filter((from) => canTransition(from, to))
}

export const cacheModes = ["FP16", "Q8", "Q6", "Q4"] as const
export type CacheMode = (typeof cacheModes)[number]

/** Tuning flags handed to the inference subprocess. */
export type InferenceParams = {
  stage1Model?: string
  stage2Model?: string
  stage2BatchSize: number
  runNSegments: number
  maxNewTokens: number
  repetitionPenalty: number
  stage2CacheSize: number
  stage1CacheSize?: number
  stage1CacheMode?: CacheMode
  stage2CacheMode?: CacheMode
  cudaIdx?: number
  stage1NoGuidance?: boolean
  keepIntermediate?: boolean
  disableOffloadModel?: boolean
}

export const DEFAULT_INFERENCE_PARAMS = {
  stage2BatchSize: 12,
  runNSegments: 2,
  maxNewTokens: 3000,
  repetitionPenalty: 1.1,
  stage2CacheSize: 32768,
} satisfies Partial<InferenceParams>

type SongInputBase = {
  userId: string
  songName: string
  params: InferenceParams
}

/** Genre and lyrics supplied by the caller. */
export type ExplicitSongInput = SongInputBase & {
  source: "explicit"
  genre: string
  lyrics: string
  prompt?: string
}

/** At least one of genre and lyrics is produced from the prompt by the worker. */
export type PromptSongInput = SongInputBase & {
  source: "prompt"
  prompt: string
  genre?: string
  lyrics?: string
}

export type SongInput = ExplicitSongInput | PromptSongInput

export type ArtifactLocation = {
  /** Absolute path on the worker's disk. */
  localPath: string
  remote?: ObjectRef
}

/** Logical artifact name ("audio", "lyrics", "genre", a file name) to location. */
export type OutputManifest = Record<string, ArtifactLocation>

type SongJobBase = {
  id: SongJobId
  input: SongInput
  submittedAt: Date
  usedGenres?: string[]
  genresWereInferred?: boolean
  lyricsProvider?: ProviderName
  remoteFolder?: string
}

export type QueuedJob = SongJobBase & {
  status: "queued"
}

export type ActiveJob = SongJobBase & {
  status: ActiveStatus
  startedAt: Date
}

export type CompletedJob = SongJobBase & {
  status: "complete"
  startedAt: Date
  completedAt: Date
  outputManifest: OutputManifest
}

export type FailedJob = SongJobBase & {
  status: "error"
  startedAt?: Date
  completedAt: Date
  error: string
}

export type SongJob = QueuedJob | ActiveJob | CompletedJob | FailedJob

export function isTerminal(job: SongJob): job is CompletedJob | FailedJob {
  return job.status === "complete" || job.status === "error"
}

export function isActive(job: SongJob): job is ActiveJob {
  return !isTerminal(job) && job.status !== "queued"
}

export type JobStoreWritten<J extends SongJob = SongJob> = {
  readonly kind: "written"
  readonly job: J
}

export type JobStoreNotFound = {
  readonly kind: "not_found"
}

export type JobStoreInvalidTransition = {
  readonly kind: "invalid_transition"
  readonly expected: readonly JobStatus[]
  readonly actual: JobStatus
}

export type JobStoreWriteResult<J extends SongJob = SongJob> =
  | JobStoreWritten<J>
  | JobStoreNotFound
  | JobStoreInvalidTransition

export type ActivePatch = Partial<Pick<SongJobBase, "input" | "remoteFolder">>

/** Durable home of the whole job map. Each save replaces the previous snapshot. */
export interface ResultStore {
  /** Missing or unreadable state yields an empty map. */
  load(): Promise<Map<SongJobId, SongJob>>
  save(jobs: ReadonlyMap<SongJobId, SongJob>): Promise<void>
}
