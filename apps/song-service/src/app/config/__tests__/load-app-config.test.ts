import { writeFile } from "node:fs/promises"
import * as path from "node:path"
import { ConfigError } from "@cantus/config"
import { createTempDir, type TempDir } from "../../../tests/fakes"
import { loadAppConfig, mapEnvToConfig } from "../load-app-config"
import { envSchema } from "../schema"

const fromEnv = (env: Record<string, string>) => mapEnvToConfig(envSchema.parse(env))

describe("mapEnvToConfig", () => {
  it("applies the defaults", () => {
    const config = fromEnv({})

    expect(config.server).toEqual({
      host: "0.0.0.0",
      port: 5000,
      shutdownTimeoutMs: 30_000,
      livenessPath: "/health",
      readinessPath: "/ready",
    })
    expect(config.songs.perJobEstimateSeconds).toBe(60)
    expect(config.songs.fallbackGenre).toBe("pop")
    expect(config.songs.worker.enabled).toBe(true)
    expect(config.songs.resultsFile).toBe(path.resolve("state", "results.json"))
    expect(config.inference.commandArgs).toEqual(["infer.py"])
    expect(config.lyrics).toEqual({
      defaultProvider: "anthropic",
      openai: { model: "gpt-4o" },
      anthropic: { model: "claude-3-5-sonnet-latest" },
      gemini: { model: "gemini-1.5-pro" },
    })
    expect(config.storage).toEqual({ driver: "none" })
  })

  it("reads textual flags", () => {
    expect(fromEnv({ SONGS_WORKER_ENABLED: "false" }).songs.worker.enabled).toBe(false)
    expect(fromEnv({ SONGS_WORKER_ENABLED: "0" }).songs.worker.enabled).toBe(false)
    expect(fromEnv({ LOG_PRETTY: "Yes" }).logging.prettify).toBe(true)
  })

  it("treats blank API keys as missing", () => {
    const config = fromEnv({ OPENAI_API_KEY: "  ", GOOGLE_API_KEY: "test-secret" })

    expect(config.lyrics.openai).toEqual({ model: "gpt-4o" })
    expect(config.lyrics.gemini).toEqual({ model: "gemini-1.5-pro", apiKey: "test-secret" })
  })

  it("splits the inference arguments and anchors route paths", () => {
    const config = fromEnv({
      INFERENCE_ARGS: " infer.py  --seed 7 ",
      SERVER_READINESS_PATH: "ready",
    })

    expect(config.inference.commandArgs).toEqual(["infer.py", "--seed", "7"])
    expect(config.server.readinessPath).toBe("/ready")
  })

  it("maps the cloud storage settings", () => {
    const config = fromEnv({
      STORAGE_DRIVER: "gcs",
      STORAGE_BUCKET: "songs",
      GCS_PROJECT_ID: "test-project",
      GCS_KEY_PREFIX: "prod",
    })

    expect(config.storage).toEqual({
      driver: "gcs",
      bucket: "songs",
      projectId: "test-project",
      keyspacePrefix: "prod",
    })
  })
})

describe("loadAppConfig", () => {
  let dir: TempDir

  beforeEach(async () => {
    dir = await createTempDir("cantus-config-")
  })

  afterEach(async () => {
    await dir.remove()
  })

  it("layers config.json, the dotenv file, the environment and overrides", async () => {
    await writeFile(
      path.join(dir.path, "config.json"),
      JSON.stringify({ songs_per_job_estimate_seconds: 90, openai_api_key: "test-secret", server_port: 7000 }),
    )
    await writeFile(path.join(dir.path, ".env.test"), "SERVER_PORT=6001\nSONGS_FALLBACK_GENRE=rock\n")

    const config = await loadAppConfig(
      { NODE_ENV: "test", SONGS_FALLBACK_GENRE: "jazz" },
      { cwd: dir.path, overrides: { SONGS_PER_JOB_ESTIMATE_SECONDS: "45" } },
    )

    expect(config.server.port).toBe(6001)
    expect(config.songs.fallbackGenre).toBe("jazz")
    expect(config.songs.perJobEstimateSeconds).toBe(45)
    expect(config.lyrics.openai.apiKey).toBe("test-secret")
  })

  it("rejects an unknown lyrics provider", async () => {
    await expect(
      loadAppConfig({ LYRICS_PROVIDER: "mistral" }, { cwd: dir.path }),
    ).rejects.toBeInstanceOf(ConfigError)
  })
})
