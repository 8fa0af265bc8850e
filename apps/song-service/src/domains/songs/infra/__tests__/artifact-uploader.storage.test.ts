import { writeFile } from "node:fs/promises"
import * as path from "node:path"
import { FakeClock } from "@cantus/clock"
import type { Logger } from "@cantus/logger"
import { MemoryStorage, type StoragePort } from "@cantus/storage"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { mock, type MockProxy } from "vitest-mock-extended"
import { createTempDir, type TempDir } from "../../../../tests/fakes"
import { contentTypeFor } from "../../services/output-discovery"
import { StorageArtifactUploader } from "../artifact-uploader.storage"

describe("StorageArtifactUploader", () => {
  let dir: TempDir
  let storage: MemoryStorage
  let logger: MockProxy<Logger>

  beforeEach(async () => {
    dir = await createTempDir()
    storage = new MemoryStorage({ clock: new FakeClock() })
    logger = mock<Logger>()
  })

  afterEach(async () => {
    await dir.remove()
  })

  it("stores the file with a content type from its extension", async () => {
    const file = path.join(dir.path, "song.wav")
    await writeFile(file, "audio-bytes")
    const uploader = new StorageArtifactUploader({ storage, logger }, { bucket: "songs" })

    const ref = await uploader.upload(file, "u1_x/song.wav")

    expect(ref).toEqual({ bucket: "songs", key: "u1_x/song.wav" })
    const head = await storage.head({ bucket: "songs", key: "u1_x/song.wav" })
    expect(head?.contentType).toBe("audio/wav")
    expect(head?.sizeInBytes).toBe(11)
  })

  it("returns null and warns when the local file is missing", async () => {
    const uploader = new StorageArtifactUploader({ storage, logger }, { bucket: "songs" })

    const ref = await uploader.upload(path.join(dir.path, "missing.wav"), "k")

    expect(ref).toBeNull()
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })

  it("returns null when the storage rejects", async () => {
    const file = path.join(dir.path, "lyrics.txt")
    await writeFile(file, "x")
    const failing = mock<StoragePort>()
    failing.put.mockRejectedValue(new Error("503"))
    const uploader = new StorageArtifactUploader({ storage: failing, logger }, { bucket: "songs" })

    await expect(uploader.upload(file, "k")).resolves.toBeNull()
    expect(logger.warn).toHaveBeenCalledWith(
      "Upload failed, file stays local",
      expect.objectContaining({ key: "k", reason: "503" }),
    )
  })

  it("maps unknown extensions to octet-stream", () => {
    expect(contentTypeFor("a.MP3")).toBe("audio/mpeg")
    expect(contentTypeFor("a.bin")).toBe("application/octet-stream")
  })
})
