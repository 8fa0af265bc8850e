import type { Readable } from "node:stream"
import type { InferenceParams, JobStatus, OutputManifest, SongJobId } from "./job.model"
import type { ProviderName } from "./lyrics.model"

/** Caller-facing submission. Needs genre and lyrics, or a prompt. */
export type SubmitSongRequest = {
  genre?: string
  lyrics?: string
  prompt?: string
  userId?: string
  songName?: string
  params?: Partial<InferenceParams>
}

export type SubmitSongResult = {
  requestId: SongJobId
  status: "queued"
  queuePosition: number
  estimatedWaitSeconds: number
}

export type SongStatusView = {
  requestId: SongJobId
  status: JobStatus
  submittedAt: string
  startedAt?: string
  completedAt?: string
  queuePosition?: number
  estimatedWaitSeconds?: number
  genre?: string
  lyrics?: string
  usedGenres?: string[]
  genresWereInferred?: boolean
  lyricsProvider?: ProviderName
  remoteFolder?: string
  outputManifest?: OutputManifest
  error?: string
}

export type WithGenresRequest = Omit<SubmitSongRequest, "genre" | "lyrics" | "prompt"> & {
  prompt: string
  genres?: string[]
}

export type WithGenresResult = SubmitSongResult & {
  lyrics: string
  usedGenres: string[]
  genresWereInferred: boolean
  provider: ProviderName
  downloadInstructions: {
    checkStatus: string
    downloadWhenReady: string
    supportedFormats: string[]
  }
  genreInfo?: {
    message: string
    inferredGenres: string[]
  }
  warnings?: {
    message: string
    invalidGenres: string[]
  }
}

export type RepairResult = {
  requestId: SongJobId
  outputManifest: OutputManifest
}

/** A readable artifact, local or fetched from remote storage. */
export type SongArtifact = {
  fileName: string
  contentType: string
  sizeInBytes: number
  body: Readable
}
