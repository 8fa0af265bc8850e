import { rm, writeFile } from "node:fs/promises"
import * as path from "node:path"
import type { Readable } from "node:stream"
import { FakeClock } from "@cantus/clock"
import { NullLogger } from "@cantus/logger"
import { MemoryStorage } from "@cantus/storage"
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"
import {
  createTempDir,
  MemoryResultStore,
  queuedJob,
  type TempDir,
} from "../../../../tests/fakes"
import { createSongDomain, type SongDomain } from "../../../../tests/song-domain"
import { StorageArtifactUploader } from "../../infra/artifact-uploader.storage"
import type { ActiveJob, CompletedJob } from "../../model/job.model"
import { NotFoundError, SubmissionError } from "../../model/song.errors"
import { mergeManifest, toSongInput } from "../song-orchestrator"

async function readAll(body: Readable): Promise<string> {
  const chunks: Buffer[] = []
  for await (const chunk of body) chunks.push(Buffer.from(chunk))
  return Buffer.concat(chunks).toString("utf8")
}

describe("toSongInput", () => {
  it("prefers explicit genre and lyrics", () => {
    expect(toSongInput({ genre: " Rock ", lyrics: "[verse]\nx", prompt: "sea" })).toEqual({
      source: "explicit",
      userId: "anonymous",
      songName: "untitled_song",
      params: {
        stage2BatchSize: 12,
        runNSegments: 2,
        maxNewTokens: 3000,
        repetitionPenalty: 1.1,
        stage2CacheSize: 32768,
      },
      genre: "Rock",
      lyrics: "[verse]\nx",
      prompt: "sea",
    })
  })

  it("uses the prompt when genre or lyrics are missing", () => {
    expect(
      toSongInput({ prompt: "sea", genre: "jazz", userId: "u9", params: { cudaIdx: 1 } }),
    ).toMatchObject({
      source: "prompt",
      prompt: "sea",
      genre: "jazz",
      userId: "u9",
      params: { cudaIdx: 1, stage2BatchSize: 12 },
    })
  })

  it("rejects a request with neither", () => {
    expect(() => toSongInput({ genre: "rock", lyrics: "  " })).toThrow(SubmissionError)
  })
})

describe("mergeManifest", () => {
  it("keeps remote references that still point at the same file", () => {
    const remote = { bucket: "songs", key: "f/a.wav" }

    expect(
      mergeManifest(
        {
          audio: { localPath: "/o/a.wav", remote },
          lyrics: { localPath: "/o/lyrics.txt", remote: { bucket: "songs", key: "f/l.txt" } },
          "old.wav": { localPath: "/o/old.wav" },
        },
        { audio: { localPath: "/o/a.wav" }, "a.wav": { localPath: "/o/a.wav" } },
      ),
    ).toEqual({
      audio: { localPath: "/o/a.wav", remote },
      lyrics: { localPath: "/o/lyrics.txt", remote: { bucket: "songs", key: "f/l.txt" } },
      "a.wav": { localPath: "/o/a.wav" },
    })
  })
})

describe("SongOrchestrator", () => {
  let dir: TempDir
  let domain: SongDomain

  const complete = async () => {
    const { requestId } = await domain.orchestrator.submit({ genre: "Rock", lyrics: "[verse]\nx" })
    await domain.worker.start()
    await vi.waitFor(() => expect(domain.store.get(requestId)?.status).toBe("complete"))
    await domain.worker.stop()
    return requestId
  }

  beforeEach(async () => {
    dir = await createTempDir()
    domain = createSongDomain({ outputDir: dir.path })
  })

  afterEach(async () => {
    await domain.worker.stop()
    await dir.remove()
  })

  describe("submit", () => {
    it("queues jobs behind the ones already pending", async () => {
      const first = await domain.orchestrator.submit({ genre: "rock", lyrics: "x" })
      const second = await domain.orchestrator.submit({ prompt: "a song about rain" })

      expect(first).toMatchObject({ status: "queued", queuePosition: 0, estimatedWaitSeconds: 0 })
      expect(second).toMatchObject({ status: "queued", queuePosition: 1, estimatedWaitSeconds: 60 })
      expect(domain.resultStore.persisted(second.requestId)).toMatchObject({
        status: "queued",
        submittedAt: new Date("2026-03-01T12:00:00.000Z"),
        lyricsProvider: "anthropic",
      })
    })

    it("does not record a provider when lyrics were supplied", async () => {
      const { requestId } = await domain.orchestrator.submit({ genre: "rock", lyrics: "x" })

      expect(domain.store.get(requestId)).not.toHaveProperty("lyricsProvider")
    })

    it("stores nothing for an incomplete request", async () => {
      await expect(domain.orchestrator.submit({ genre: "rock" })).rejects.toThrow(
        "Provide both genre and lyrics, or a prompt",
      )
      expect(domain.store.size).toBe(0)
    })
  })

  describe("status", () => {
    it("shows the queue position while queued", async () => {
      await domain.orchestrator.submit({ genre: "rock", lyrics: "x" })
      const { requestId } = await domain.orchestrator.submit({ genre: "jazz", lyrics: "y" })

      expect(domain.orchestrator.status(requestId)).toEqual({
        requestId,
        status: "queued",
        submittedAt: "2026-03-01T12:00:00.000Z",
        genre: "jazz",
        lyrics: "y",
        queuePosition: 1,
        estimatedWaitSeconds: 60,
      })
    })

    it("shows timestamps and the manifest when complete", async () => {
      const id = await complete()

      expect(domain.orchestrator.status(id)).toMatchObject({
        status: "complete",
        startedAt: "2026-03-01T12:00:00.000Z",
        completedAt: "2026-03-01T12:00:00.000Z",
        outputManifest: { audio: { localPath: path.join(dir.path, id, "song.wav") } },
      })
      expect(domain.orchestrator.status(id)).not.toHaveProperty("queuePosition")
    })

    it("shows the error of a failed job", async () => {
      domain.runner.result = { exitCode: 1 }
      const { requestId } = await domain.orchestrator.submit({ genre: "rock", lyrics: "x" })
      await domain.worker.start()
      await vi.waitFor(() => expect(domain.store.get(requestId)?.status).toBe("error"))

      expect(domain.orchestrator.status(requestId)).toMatchObject({
        status: "error",
        error: "Inference failed with exit code 1",
        startedAt: "2026-03-01T12:00:00.000Z",
      })
    })

    it("throws not found for unknown and malformed ids", () => {
      expect(() => domain.orchestrator.status(queuedJob().id)).toThrow(NotFoundError)
      expect(() => domain.orchestrator.status("not-an-id")).toThrow("Request not-an-id not found")
    })
  })

  describe("submitWithGenres", () => {
    it("keeps recognized genres and reports the rest", async () => {
      const result = await domain.orchestrator.submitWithGenres({
        prompt: "city nights",
        genres: ["Rock", "Hiphop", "zzzz", "rock"],
      })

      expect(result).toEqual({
        requestId: result.requestId,
        status: "queued",
        queuePosition: 0,
        estimatedWaitSeconds: 0,
        lyrics: "[verse]\ngenerated line",
        usedGenres: ["rock", "hip-hop"],
        genresWereInferred: false,
        provider: "anthropic",
        downloadInstructions: {
          checkStatus: `/api/v1/songs/${result.requestId}`,
          downloadWhenReady: `/api/v1/songs/${result.requestId}/download`,
          supportedFormats: ["mp3", "wav", "mid"],
        },
        warnings: {
          message: "Some genres were not recognized and were omitted.",
          invalidGenres: ["zzzz"],
        },
      })
      expect(domain.provider.calls).toEqual(["with-genres:city nights:rock,hip-hop"])
      expect(domain.store.get(result.requestId)).toMatchObject({
        input: { source: "explicit", genre: "rock", prompt: "city nights" },
        usedGenres: ["rock", "hip-hop"],
        genresWereInferred: false,
        lyricsProvider: "anthropic",
      })
    })

    it("infers genres when none are usable", async () => {
      const result = await domain.orchestrator.submitWithGenres({ prompt: "slow night", genres: [] })

      expect(result).toMatchObject({
        usedGenres: ["rock", "blues"],
        genresWereInferred: true,
        genreInfo: {
          message: "Genres were automatically inferred from the prompt",
          inferredGenres: ["rock", "blues"],
        },
      })
      expect(result).not.toHaveProperty("warnings")
    })

    it("queues nothing when lyrics generation fails", async () => {
      domain.provider.failure = new Error("provider down")

      await expect(
        domain.orchestrator.submitWithGenres({ prompt: "x", genres: ["rock"] }),
      ).rejects.toThrow("provider down")
      expect(domain.store.size).toBe(0)
    })
  })

  describe("openArtifact", () => {
    it("opens the primary audio by default", async () => {
      const id = await complete()

      const artifact = await domain.orchestrator.openArtifact(id)

      expect(artifact).toMatchObject({
        fileName: "song.wav",
        contentType: "audio/wav",
        sizeInBytes: 15,
      })
      await expect(readAll(artifact.body)).resolves.toBe("RIFF-test-audio")
    })

    it("opens an entry by manifest key or by extension", async () => {
      const id = await complete()

      const lyrics = await domain.orchestrator.openArtifact(id, "lyrics")
      await expect(readAll(lyrics.body)).resolves.toBe("[verse]\nx")
      expect(lyrics.contentType).toBe("text/plain; charset=utf-8")

      const wav = await domain.orchestrator.openArtifact(id, "WAV")
      expect(wav.fileName).toBe("song.wav")
      await expect(readAll(wav.body)).resolves.toBe("RIFF-test-audio")
    })

    it("lists the available types when the requested one is missing", async () => {
      const id = await complete()

      await expect(domain.orchestrator.openArtifact(id, "mp3")).rejects.toThrow(
        "No mp3 file found for this request. Available types: audio, genre, lyrics, song.wav",
      )
    })

    it.each(["constructor", "__proto__"])(
      "treats the inherited key %s as a missing type",
      async (type) => {
        const id = await complete()

        await expect(domain.orchestrator.openArtifact(id, type)).rejects.toThrow(
          `No ${type} file found for this request. Available types: audio, genre, lyrics, song.wav`,
        )
      },
    )

    it("refuses jobs that are not complete", async () => {
      const { requestId } = await domain.orchestrator.submit({ genre: "rock", lyrics: "x" })

      await expect(domain.orchestrator.openArtifact(requestId)).rejects.toThrow(
        `Request ${requestId} is not complete (status: queued)`,
      )
    })

    it("reports a file that disappeared", async () => {
      const id = await complete()
      await rm(path.join(dir.path, id, "song.wav"))

      await expect(domain.orchestrator.openArtifact(id)).rejects.toThrow(
        "The audio file for this request is no longer available",
      )
    })

    it("falls back to remote storage when the local copy is gone", async () => {
      const storage = new MemoryStorage({ clock: new FakeClock() })
      domain = createSongDomain({
        outputDir: dir.path,
        storage,
        uploader: new StorageArtifactUploader(
          { storage, logger: new NullLogger() },
          { bucket: "songs" },
        ),
      })
      const id = await complete()
      await rm(path.join(dir.path, id, "song.wav"))

      const artifact = await domain.orchestrator.openArtifact(id)

      expect(artifact).toMatchObject({ fileName: "untitled_song.wav", contentType: "audio/wav" })
      await expect(readAll(artifact.body)).resolves.toBe("RIFF-test-audio")
    })
  })

  describe("repair", () => {
    it("rebuilds the manifest of a completed job", async () => {
      const id = await complete()
      await domain.store.replaceManifest(id, {})
      await writeFile(path.join(dir.path, id, "extra.mid"), "midi")

      const result = await domain.orchestrator.repair(id)

      const jobDir = path.join(dir.path, id)
      expect(result).toEqual({
        requestId: id,
        outputManifest: {
          audio: { localPath: path.join(jobDir, "song.wav") },
          "song.wav": { localPath: path.join(jobDir, "song.wav") },
          "extra.mid": { localPath: path.join(jobDir, "extra.mid") },
          lyrics: { localPath: path.join(jobDir, "lyrics.txt") },
          genre: { localPath: path.join(jobDir, "genre.txt") },
        },
      })
      expect(domain.resultStore.persisted(id)).toMatchObject({ outputManifest: result.outputManifest })
    })

    it("reports a job with no outputs left", async () => {
      const id = await complete()
      await rm(path.join(dir.path, id, "song.wav"))

      await expect(domain.orchestrator.repair(id)).rejects.toThrow(
        "No output files found for this request",
      )
    })

    it("refuses jobs that are not complete", async () => {
      const { requestId } = await domain.orchestrator.submit({ genre: "rock", lyrics: "x" })

      await expect(domain.orchestrator.repair(requestId)).rejects.toBeInstanceOf(NotFoundError)
    })
  })

  describe("restore", () => {
    it("requeues queued jobs in submission order and repairs lost manifests", async () => {
      const later = queuedJob({ submittedAt: new Date("2026-02-01T00:02:00.000Z") })
      const earlier = queuedJob({ submittedAt: new Date("2026-02-01T00:01:00.000Z") })
      const stuck: ActiveJob = {
        ...queuedJob(),
        status: "generating_audio",
        startedAt: new Date("2026-02-01T00:00:30.000Z"),
      }
      const lost: CompletedJob = {
        ...queuedJob(),
        status: "complete",
        startedAt: new Date(0),
        completedAt: new Date(0),
        outputManifest: {},
      }
      domain = createSongDomain({
        outputDir: dir.path,
        resultStore: new MemoryResultStore([later, stuck, earlier, lost]),
      })
      await domain.workspaces.prepare(lost.id, "rock", "x")
      await writeFile(path.join(dir.path, lost.id, "song.wav"), "a")

      const report = await domain.orchestrator.restore()

      expect(report).toEqual({
        loaded: 4,
        requeued: 2,
        repaired: [lost.id],
        unresolved: [],
      })
      expect(domain.queue.poll()).toBe(earlier.id)
      expect(domain.queue.poll()).toBe(later.id)
      expect(domain.queue.poll()).toBeUndefined()
      expect(domain.store.get(stuck.id)).toEqual(stuck)
      expect(domain.store.get(lost.id)).toMatchObject({
        status: "complete",
        outputManifest: { audio: { localPath: path.join(dir.path, lost.id, "song.wav") } },
      })
    })

    it("reloads the last persisted state after a crash mid-generation", async () => {
      const resultStore = new MemoryResultStore()
      const crashed = createSongDomain({ outputDir: dir.path, resultStore })
      let release: () => void = () => {}
      crashed.runner.gate = new Promise<void>((resolve) => {
        release = resolve
      })
      const { requestId } = await crashed.orchestrator.submit({ genre: "rock", lyrics: "x" })
      await crashed.worker.start()
      await vi.waitFor(() =>
        expect(crashed.store.get(requestId)?.status).toBe("generating_audio"),
      )

      const restarted = createSongDomain({
        outputDir: dir.path,
        resultStore: new MemoryResultStore(resultStore.saves.at(-1)),
      })
      const report = await restarted.orchestrator.restore()

      expect(report).toMatchObject({ loaded: 1, requeued: 0, repaired: [], unresolved: [] })
      expect(restarted.store.get(requestId)).toMatchObject({
        status: "generating_audio",
        input: { genre: "rock", lyrics: "x" },
      })
      expect(restarted.queue.size).toBe(0)

      release()
      await crashed.worker.stop()
    })
  })
})
