import { beforeEach, describe, expect, it } from "vitest"
import { Mutex } from "../../../../lib"
import { MemoryResultStore, queuedJob } from "../../../../tests/fakes"
import { SongJobId } from "../../model/job.model"
import { JobStateError } from "../../model/song.errors"
import { SongJobStore } from "../song-job-store"

describe("SongJobStore", () => {
  const t0 = new Date("2026-01-01T00:00:00.000Z")
  const t1 = new Date("2026-01-01T00:01:00.000Z")

  let resultStore: MemoryResultStore
  let store: SongJobStore

  beforeEach(() => {
    resultStore = new MemoryResultStore()
    store = new SongJobStore({ resultStore, mutex: new Mutex() })
  })

  describe("insert", () => {
    it("persists the job before returning", async () => {
      const job = queuedJob()

      await store.insert(job)

      expect(store.get(job.id)).toEqual(job)
      expect(resultStore.persisted(job.id)).toEqual(job)
    })

    it("rejects a duplicate id", async () => {
      const job = queuedJob()
      await store.insert(job)

      await expect(store.insert(job)).rejects.toBeInstanceOf(JobStateError)
      expect(resultStore.saves).toHaveLength(1)
    })

    it("leaves memory untouched when the save fails", async () => {
      resultStore.failSaves = true
      const job = queuedJob()

      await expect(store.insert(job)).rejects.toThrow("disk full")
      expect(store.get(job.id)).toBeUndefined()
    })
  })

  describe("transitions", () => {
    it("walks a job through the happy path", async () => {
      const job = queuedJob()
      await store.insert(job)

      const processing = await store.markProcessing(job.id, t0)
      expect(processing).toMatchObject({ kind: "written", job: { status: "processing", startedAt: t0 } })

      await store.advance(job.id, "generating_audio")
      await store.advance(job.id, "uploading", { remoteFolder: "user-1_x_song" })
      const done = await store.markComplete(job.id, t1, { audio: { localPath: "/out/a.wav" } })

      expect(done).toEqual({
        kind: "written",
        job: {
          ...job,
          status: "complete",
          startedAt: t0,
          completedAt: t1,
          remoteFolder: "user-1_x_song",
          outputManifest: { audio: { localPath: "/out/a.wav" } },
        },
      })
      expect(resultStore.persisted(job.id)).toEqual(store.get(job.id))
    })

    it("rejects skipping a stage", async () => {
      const job = queuedJob()
      await store.insert(job)
      await store.markProcessing(job.id, t0)

      const result = await store.advance(job.id, "uploading")

      expect(result).toEqual({
        kind: "invalid_transition",
        expected: ["generating_audio"],
        actual: "processing",
      })
      expect(store.get(job.id)?.status).toBe("processing")
    })

    it("rejects a second start", async () => {
      const job = queuedJob()
      await store.insert(job)
      await store.markProcessing(job.id, t0)

      const result = await store.markProcessing(job.id, t1)

      expect(result).toEqual({ kind: "invalid_transition", expected: ["queued"], actual: "processing" })
    })

    it("reports unknown ids", async () => {
      await expect(store.markProcessing(SongJobId.generate(), t0)).resolves.toEqual({
        kind: "not_found",
      })
    })

    it("fails a queued job without a start time", async () => {
      const job = queuedJob()
      await store.insert(job)

      const result = await store.markFailed(job.id, t1, "boom")

      expect(result).toEqual({
        kind: "written",
        job: { ...job, status: "error", completedAt: t1, error: "boom" },
      })
    })

    it("never leaves a terminal state", async () => {
      const job = queuedJob()
      await store.insert(job)
      await store.markFailed(job.id, t0, "first")

      const result = await store.markFailed(job.id, t1, "second")

      expect(result).toMatchObject({ kind: "invalid_transition", actual: "error" })
      expect(store.get(job.id)).toMatchObject({ error: "first", completedAt: t0 })
    })
  })

  describe("replaceManifest", () => {
    it("only touches completed jobs", async () => {
      const job = queuedJob()
      await store.insert(job)

      const result = await store.replaceManifest(job.id, { audio: { localPath: "/a.wav" } })

      expect(result).toEqual({ kind: "invalid_transition", expected: ["complete"], actual: "queued" })
    })
  })

  it("load replaces the in-memory map with the persisted one", async () => {
    const job = queuedJob()
    const reloaded = new SongJobStore({
      resultStore: new MemoryResultStore([job]),
      mutex: new Mutex(),
    })

    await expect(reloaded.load()).resolves.toEqual([job])
    expect(reloaded.get(job.id)).toEqual(job)
    expect(reloaded.size).toBe(1)
  })
})
