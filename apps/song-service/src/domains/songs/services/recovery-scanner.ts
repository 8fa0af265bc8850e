import { access } from "node:fs/promises"
import { errorMessage } from "@cantus/errors"
import type { Logger } from "@cantus/logger"
import type { OutputManifest, SongJobId } from "../model/job.model"
import { collectManifest } from "./artifact-publisher"
import type { JobWorkspaces } from "./job-workspace"
import { type OutputDiscovery, pickPrimaryAudio } from "./output-discovery"
import type { SongJobStore } from "./song-job-store"

export type RecoveryScannerDeps = {
  store: SongJobStore
  discovery: OutputDiscovery
  workspaces: JobWorkspaces
  logger: Logger
}

export type RecoveryReport = {
  repaired: SongJobId[]
  unresolved: SongJobId[]
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file)
    return true
  } catch {
    return false
  }
}

/**
 * Rebuilds manifests of completed jobs from what is on disk. Jobs in any
 * other state are never touched.
 */
export class RecoveryScanner {
  constructor(private readonly deps: RecoveryScannerDeps) {}

  async scan(): Promise<RecoveryReport> {
    const report: RecoveryReport = { repaired: [], unresolved: [] }

    for (const job of this.deps.store.list()) {
      if (job.status !== "complete" || Object.keys(job.outputManifest).length > 0) continue

      const log = this.deps.logger.child({ jobId: job.id })

      try {
        const manifest = await this.rediscover(job.id)

        if (!manifest) {
          log.warn("No outputs found for completed job")
          report.unresolved.push(job.id)
          continue
        }

        const result = await this.deps.store.replaceManifest(job.id, manifest)
        if (result.kind === "written") report.repaired.push(job.id)
        else report.unresolved.push(job.id)
      } catch (err) {
        log.warn("Could not recover job outputs", { reason: errorMessage(err) })
        report.unresolved.push(job.id)
      }
    }

    return report
  }

  /** Manifest of the job's local outputs, or `null` when nothing is there. */
  async rediscover(id: SongJobId): Promise<OutputManifest | null> {
    const workspace = this.deps.workspaces.for(id)
    const artifacts = await this.deps.discovery.discover(workspace.dir)
    if (artifacts.length === 0) return null

    const textFiles: string[] = []
    for (const file of [workspace.lyricsPath, workspace.genrePath]) {
      if (await exists(file)) textFiles.push(file)
    }

    return collectManifest(artifacts, pickPrimaryAudio(artifacts), textFiles)
  }
}
