import { mkdir, writeFile } from "node:fs/promises"
import * as path from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import {
  createTempDir,
  MemoryResultStore,
  queuedJob,
  type TempDir,
} from "../../../../tests/fakes"
import { createSongDomain, type SongDomain } from "../../../../tests/song-domain"
import type { ActiveJob, CompletedJob, FailedJob, SongJobId } from "../../model/job.model"

describe("RecoveryScanner", () => {
  const t0 = new Date("2026-02-01T00:00:00.000Z")

  let dir: TempDir

  const completed = (outputManifest: CompletedJob["outputManifest"] = {}): CompletedJob => ({
    ...queuedJob(),
    status: "complete",
    startedAt: t0,
    completedAt: t0,
    outputManifest,
  })

  const writeOutput = async (domain: SongDomain, id: SongJobId, file: string) => {
    const target = path.join(domain.workspaces.for(id).dir, file)
    await mkdir(path.dirname(target), { recursive: true })
    await writeFile(target, "audio")
    return target
  }

  const domainWith = async (...jobs: (CompletedJob | ActiveJob | FailedJob)[]) => {
    const domain = createSongDomain({
      outputDir: dir.path,
      resultStore: new MemoryResultStore(jobs),
    })
    await domain.store.load()
    return domain
  }

  beforeEach(async () => {
    dir = await createTempDir()
  })

  afterEach(async () => {
    await dir.remove()
  })

  it("rebuilds an empty manifest from the output directory", async () => {
    const job = completed()
    const domain = await domainWith(job)
    const audio = await writeOutput(domain, job.id, "song.wav")
    const lyrics = await writeOutput(domain, job.id, "lyrics.txt")

    const report = await domain.recovery.scan()

    expect(report).toEqual({ repaired: [job.id], unresolved: [] })
    expect(domain.store.get(job.id)).toEqual({
      ...job,
      outputManifest: {
        "song.wav": { localPath: audio },
        audio: { localPath: audio },
        lyrics: { localPath: lyrics },
      },
    })
    expect(domain.resultStore.persisted(job.id)).toEqual(domain.store.get(job.id))
  })

  it("reports a completed job whose outputs are gone", async () => {
    const job = completed()
    const domain = await domainWith(job)

    await expect(domain.recovery.scan()).resolves.toEqual({ repaired: [], unresolved: [job.id] })
    expect(domain.store.get(job.id)).toEqual(job)
  })

  it("never touches jobs that are not complete or already have a manifest", async () => {
    const active: ActiveJob = { ...queuedJob(), status: "generating_audio", startedAt: t0 }
    const failed: FailedJob = { ...queuedJob(), status: "error", completedAt: t0, error: "boom" }
    const done = completed({ audio: { localPath: "/elsewhere/a.wav" } })
    const domain = await domainWith(active, failed, done)
    for (const job of [active, failed, done]) await writeOutput(domain, job.id, "song.wav")

    await expect(domain.recovery.scan()).resolves.toEqual({ repaired: [], unresolved: [] })
    expect(domain.store.list()).toEqual([active, failed, done])
    expect(domain.resultStore.saves).toEqual([])
  })
})
