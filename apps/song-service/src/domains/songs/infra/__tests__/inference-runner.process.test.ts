import { writeFile } from "node:fs/promises"
import * as path from "node:path"
import { SystemClock } from "@cantus/clock"
import type { Logger } from "@cantus/logger"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { mock, type MockProxy } from "vitest-mock-extended"
import { createTempDir, type TempDir } from "../../../../tests/fakes"
import type { InferenceRequest } from "../../model/inference.model"
import { DEFAULT_INFERENCE_PARAMS, SongJobId } from "../../model/job.model"
import { buildInferenceArgs, ProcessInferenceRunner } from "../inference-runner.process"

const models = { stage1Model: "/models/s1", stage2Model: "/models/s2" }

const request = (overrides: Partial<InferenceRequest> = {}): InferenceRequest => ({
  jobId: SongJobId.generate(),
  genrePath: "/out/j/genre.txt",
  lyricsPath: "/out/j/lyrics.txt",
  outputDir: "/out/j",
  params: { ...DEFAULT_INFERENCE_PARAMS },
  ...overrides,
})

describe("buildInferenceArgs", () => {
  it("always passes paths, models and the tuning defaults", () => {
    expect(buildInferenceArgs(request(), models)).toEqual([
      "--genre_txt",
      "/out/j/genre.txt",
      "--lyrics_txt",
      "/out/j/lyrics.txt",
      "--output_dir",
      "/out/j",
      "--stage1_model",
      "/models/s1",
      "--stage2_model",
      "/models/s2",
      "--stage1_use_exl2",
      "--stage2_use_exl2",
      "--stage2_batch_size",
      "12",
      "--run_n_segments",
      "2",
      "--max_new_tokens",
      "3000",
      "--repetition_penalty",
      "1.1",
      "--stage2_cache_size",
      "32768",
    ])
  })

  it("adds optional values and only the switches that are on", () => {
    const args = buildInferenceArgs(
      request({
        params: {
          ...DEFAULT_INFERENCE_PARAMS,
          stage1Model: "/custom/s1",
          cudaIdx: 0,
          stage1CacheSize: 8192,
          stage2CacheMode: "Q8",
          keepIntermediate: true,
          stage1NoGuidance: false,
        },
      }),
      models,
    )

    expect(args.slice(6, 10)).toEqual(["--stage1_model", "/custom/s1", "--stage2_model", "/models/s2"])
    expect(args.slice(22)).toEqual([
      "--cuda_idx",
      "0",
      "--stage1_cache_size",
      "8192",
      "--stage2_cache_mode",
      "Q8",
      "--keep_intermediate",
    ])
  })
})

describe("ProcessInferenceRunner", () => {
  let dir: TempDir
  let logger: MockProxy<Logger>

  beforeEach(async () => {
    dir = await createTempDir()
    logger = mock<Logger>()
    logger.child.mockReturnValue(logger)
  })

  afterEach(async () => {
    await dir.remove()
  })

  const runnerFor = async (source: string, timeoutMs?: number) => {
    const script = path.join(dir.path, "engine.mjs")
    await writeFile(script, source, "utf8")

    return new ProcessInferenceRunner(
      { clock: new SystemClock(), logger },
      {
        ...models,
        command: process.execPath,
        commandArgs: [script],
        killGraceMs: 200,
        ...(timeoutMs !== undefined && { timeoutMs }),
      },
    )
  }

  it("reports a clean exit and streams output lines at debug", async () => {
    const runner = await runnerFor(
      `const i = process.argv.indexOf("--output_dir"); console.log("out=" + process.argv[i + 1]); console.error("warming up")`,
    )

    const result = await runner.run(request())

    expect(result).toMatchObject({ exitCode: 0, signal: null, timedOut: false })
    expect(logger.debug).toHaveBeenCalledWith("out=/out/j", { stream: "stdout" })
    expect(logger.debug).toHaveBeenCalledWith("warming up", { stream: "stderr" })
  })

  it("reports a non-zero exit code", async () => {
    const runner = await runnerFor("process.exit(3)")

    await expect(runner.run(request())).resolves.toMatchObject({ exitCode: 3, timedOut: false })
  })

  it("terminates a run that outlives its timeout", async () => {
    const runner = await runnerFor("setTimeout(() => {}, 30000)", 100)

    const result = await runner.run(request())

    expect(result).toMatchObject({ exitCode: null, signal: "SIGTERM", timedOut: true })
  })

  it("rejects when the executable cannot be started", async () => {
    const runner = new ProcessInferenceRunner(
      { clock: new SystemClock(), logger },
      { ...models, command: path.join(dir.path, "no-such-binary"), commandArgs: [], killGraceMs: 10 },
    )

    await expect(runner.run(request())).rejects.toMatchObject({ code: "ENOENT" })
  })
})
