import type { ObjectRef } from "@cantus/storage"
import type { InferenceParams, SongJobId } from "./job.model"

export type InferenceRequest = {
  jobId: SongJobId
  genrePath: string
  lyricsPath: string
  outputDir: string
  params: InferenceParams
}

export type InferenceResult = {
  /** Null when the process was ended by a signal. */
  exitCode: number | null
  signal: NodeJS.Signals | null
  timedOut: boolean
  durationMs: number
}

/** Runs the audio synthesis engine once. Rejects only when it cannot be started. */
export interface InferenceRunner {
  run(request: InferenceRequest): Promise<InferenceResult>
}

export type DiscoveredArtifact = {
  /** Path relative to the job directory, "/" separated. */
  name: string
  path: string
  extension: string
  sizeBytes: number
}

/** Where the scratch inputs and generated outputs of one job live. */
export type JobWorkspace = {
  dir: string
  genrePath: string
  lyricsPath: string
  donePath: string
}

/** Copies one local file to remote storage. Resolves `null` instead of rejecting. */
export interface ArtifactUploader {
  upload(localPath: string, remoteKey: string): Promise<ObjectRef | null>
}
