import * as path from "node:path"
import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  JsonSource,
  loadConfig,
  ObjectSource,
} from "@cantus/config"
import { dataPath } from "../../lib"
import type { AppConfig, EnvConfig, StorageConfig } from "./schema"
import { envSchema } from "./schema"

function nonBlank(value: string | undefined): string | undefined {
  return value?.trim() ? value.trim() : undefined
}

function mapStorage(env: EnvConfig): StorageConfig {
  switch (env.STORAGE_DRIVER) {
    case "none":
      return { driver: "none" }
    case "memory":
      return { driver: "memory", bucket: env.STORAGE_BUCKET }
    case "fs":
      return { driver: "fs", bucket: env.STORAGE_BUCKET, rootDir: path.resolve(env.STORAGE_FS_ROOT) }
    case "gcs":
      return {
        driver: "gcs",
        bucket: env.STORAGE_BUCKET,
        ...(env.GCS_PROJECT_ID !== undefined && { projectId: env.GCS_PROJECT_ID }),
        ...(env.GCS_KEY_FILE !== undefined && { keyFilename: env.GCS_KEY_FILE }),
        ...(env.GCS_KEY_PREFIX !== undefined && { keyspacePrefix: env.GCS_KEY_PREFIX }),
      }
  }
}

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  const stateDir = path.resolve(env.SONGS_STATE_DIR)
  const openaiKey = nonBlank(env.OPENAI_API_KEY)
  const anthropicKey = nonBlank(env.ANTHROPIC_API_KEY)
  const googleKey = nonBlank(env.GOOGLE_API_KEY)

  return {
    app: {
      env: env.APP_ENV,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
      livenessPath: env.SERVER_LIVENESS_PATH,
      readinessPath: env.SERVER_READINESS_PATH,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    requestId: {
      enabled: env.REQUEST_ID_ENABLED,
      header: env.REQUEST_ID_HEADER,
      fallbackToTraceparent: env.REQUEST_ID_FALLBACK_TO_TRACEPARENT,
    },
    requestLogging: {
      enabled: env.REQUEST_LOGGING_ENABLED,
      level: env.REQUEST_LOGGING_LEVEL,
    },
    songs: {
      stateDir,
      resultsFile: path.resolve(env.SONGS_RESULTS_FILE ?? path.join(stateDir, "results.json")),
      outputDir: path.resolve(env.SONGS_OUTPUT_DIR),
      nestedOutputDir: env.SONGS_NESTED_OUTPUT_DIR,
      genresFile: path.resolve(env.SONGS_GENRES_FILE ?? dataPath("genres.json")),
      fallbackGenre: env.SONGS_FALLBACK_GENRE,
      perJobEstimateSeconds: env.SONGS_PER_JOB_ESTIMATE_SECONDS,
      worker: {
        enabled: env.SONGS_WORKER_ENABLED,
      },
    },
    inference: {
      command: env.INFERENCE_COMMAND,
      commandArgs: env.INFERENCE_ARGS.split(/\s+/).filter((arg) => arg !== ""),
      ...(env.INFERENCE_CWD !== undefined && { cwd: path.resolve(env.INFERENCE_CWD) }),
      stage1Model: env.INFERENCE_STAGE1_MODEL,
      stage2Model: env.INFERENCE_STAGE2_MODEL,
      ...(env.INFERENCE_TIMEOUT_MS !== undefined && { timeoutMs: env.INFERENCE_TIMEOUT_MS }),
      killGraceMs: env.INFERENCE_KILL_GRACE_MS,
    },
    lyrics: {
      defaultProvider: env.LYRICS_PROVIDER,
      openai: { model: env.OPENAI_MODEL, ...(openaiKey !== undefined && { apiKey: openaiKey }) },
      anthropic: { model: env.ANTHROPIC_MODEL, ...(anthropicKey !== undefined && { apiKey: anthropicKey }) },
      gemini: { model: env.GEMINI_MODEL, ...(googleKey !== undefined && { apiKey: googleKey }) },
    },
    storage: mapStorage(env),
  }
}

export type LoadAppConfigOptions = {
  /** Highest precedence; tests use it to pin values. */
  overrides?: Record<string, unknown>
  cwd?: string
}

/**
 * Later sources win: `config.json`, then `.env.<NODE_ENV>`, then the process
 * environment, then explicit overrides.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  options: LoadAppConfigOptions = {},
): Promise<AppConfig> {
  const cwd = options.cwd ?? process.cwd()

  const sources: ConfigSource[] = [
    new JsonSource({ file: "config.json", required: false, cwd, upperCaseKeys: true }),
    new DotenvSource({ file: `.env.${env.NODE_ENV ?? "development"}`, required: false, cwd }),
    new EnvSource({ env }),
    ...(options.overrides ? [new ObjectSource(options.overrides)] : []),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
