import { writeFile } from "node:fs/promises"
import * as path from "node:path"
import type { Logger } from "@cantus/logger"
import type { ArtifactUploader, DiscoveredArtifact, JobWorkspace } from "../model/inference.model"
import type { OutputManifest, SongInput, SongJobId } from "../model/job.model"
import { UploadError } from "../model/song.errors"
import { pickPrimaryAudio } from "./output-discovery"

export type ArtifactPublisherDeps = {
  logger: Logger
  /** Absent when no remote storage is configured. */
  uploader?: ArtifactUploader
}

export type PublishRequest = {
  id: SongJobId
  input: SongInput
  workspace: JobWorkspace
  artifacts: readonly DiscoveredArtifact[]
}

type UploadTarget = {
  entry: "lyrics" | "genre" | "audio"
  localPath: string
  remoteKey: string
}

function fileSafe(name: string): string {
  return name.replace(/[ /]/g, "_")
}

export function remoteFolderFor(id: SongJobId, input: SongInput): string {
  return `${input.userId}_${id}_${fileSafe(input.songName)}`
}

type LocalOutputs = {
  manifest: OutputManifest
  audio: DiscoveredArtifact
}

function resolveLocal(
  id: SongJobId,
  workspace: JobWorkspace,
  artifacts: readonly DiscoveredArtifact[],
): LocalOutputs {
  const audio = pickPrimaryAudio(artifacts)
  if (!audio) throw UploadError.noAudio(id, workspace.dir)

  const manifest = collectManifest(artifacts, audio, [workspace.lyricsPath, workspace.genrePath])
  return { manifest, audio }
}

/**
 * Every artifact under its own name, `audio` for the primary audio file and
 * `lyrics`/`genre` for the scratch inputs given in `textFiles`.
 */
export function collectManifest(
  artifacts: readonly DiscoveredArtifact[],
  audio: DiscoveredArtifact | undefined,
  textFiles: readonly string[],
): OutputManifest {
  const manifest: OutputManifest = {}

  for (const artifact of artifacts) {
    manifest[artifact.name] = { localPath: artifact.path }
  }

  if (audio) manifest["audio"] = { localPath: audio.path }

  for (const file of textFiles) {
    const key = path.basename(file, ".txt")
    if (key === "lyrics" || key === "genre") manifest[key] = { localPath: file }
  }

  return manifest
}

export class ArtifactPublisher {
  constructor(private readonly deps: ArtifactPublisherDeps) {}

  get uploadsEnabled(): boolean {
    return this.deps.uploader !== undefined
  }

  /**
   * Uploads the text inputs and the primary audio. Individual failures leave
   * the entry local; `done.txt` is written and uploaded only when all three
   * succeeded.
   *
   * @throws {UploadError} when there is no audio or every upload failed
   */
  async publish(request: PublishRequest): Promise<OutputManifest> {
    const { id, input, workspace, artifacts } = request
    const { manifest, audio } = resolveLocal(id, workspace, artifacts)
    const uploader = this.deps.uploader
    const log = this.deps.logger.child({ jobId: id, stage: "uploading" })

    if (!uploader) {
      log.info("No remote storage configured, artifacts stay local")
      return manifest
    }

    const folder = remoteFolderFor(id, input)
    const targets: UploadTarget[] = [
      { entry: "lyrics", localPath: workspace.lyricsPath, remoteKey: `${folder}/lyrics.txt` },
      { entry: "genre", localPath: workspace.genrePath, remoteKey: `${folder}/genre.txt` },
      {
        entry: "audio",
        localPath: audio.path,
        remoteKey: `${folder}/${fileSafe(input.songName)}${audio.extension}`,
      },
    ]

    const failed: string[] = []

    for (const target of targets) {
      const ref = await uploader.upload(target.localPath, target.remoteKey)

      if (ref) manifest[target.entry] = { localPath: target.localPath, remote: ref }
      else failed.push(target.entry)
    }

    if (failed.length === targets.length) {
      throw UploadError.allFailed(id, folder, failed)
    }

    if (failed.length > 0) {
      log.warn("Some artifacts were not uploaded", { folder, failed })
      return manifest
    }

    await writeFile(workspace.donePath, `done: ${id}\n`, "utf8")
    const doneRef = await uploader.upload(workspace.donePath, `${folder}/done.txt`)

    if (doneRef) manifest["done"] = { localPath: workspace.donePath, remote: doneRef }
    else log.warn("Completion marker was not uploaded", { folder })

    log.info("Artifacts uploaded", { folder })
    return manifest
  }
}
