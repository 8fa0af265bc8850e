import type { Milliseconds } from "@cantus/clock"
import { type LogLevelName, logLevelNames } from "@cantus/logger"
import { z } from "zod/mini"
import { type ProviderName, providerNames } from "../../domains/songs/model/lyrics.model"

export const storageDrivers = ["none", "memory", "fs", "gcs"] as const
export type StorageDriver = (typeof storageDrivers)[number]

const truthy = ["1", "true", "yes", "on"]

/** Env strings like "false" must not coerce to `true`. */
const flag = z.pipe(
  z.union([z.boolean(), z.string()]),
  z.transform((value) =>
    typeof value === "boolean" ? value : truthy.includes(value.trim().toLowerCase()),
  ),
)

export type RoutePath = `/${string}`

const routePath = z.pipe(
  z.string(),
  z.transform((value): RoutePath => `/${value.trim().replace(/^\/+/, "")}`),
)

export const envSchema = z.object({
  APP_ENV: z._default(z.string(), "development"),
  SERVICE_NAME: z._default(z.string(), "Cantus Song Service"),
  SERVER_HOST: z._default(z.string(), "0.0.0.0"),

  SERVER_PORT: z._default(z.coerce.number(), 5000),
  SERVER_SHUTDOWN_TIMEOUT_MS: z._default(z.coerce.number(), 30_000),
  SERVER_LIVENESS_PATH: z._default(routePath, "/health"),
  SERVER_READINESS_PATH: z._default(routePath, "/ready"),

  LOG_LEVEL: z._default(z.enum(logLevelNames), "info"),
  LOG_PRETTY: z._default(flag, false),

  REQUEST_ID_ENABLED: z._default(flag, true),
  REQUEST_ID_HEADER: z._default(z.string(), "x-request-id"),
  REQUEST_ID_FALLBACK_TO_TRACEPARENT: z._default(flag, false),

  REQUEST_LOGGING_ENABLED: z._default(flag, true),
  REQUEST_LOGGING_LEVEL: z._default(z.enum(logLevelNames), "info"),

  SONGS_STATE_DIR: z._default(z.string(), "./state"),
  SONGS_RESULTS_FILE: z.optional(z.string()),
  SONGS_OUTPUT_DIR: z._default(z.string(), "./output"),
  SONGS_NESTED_OUTPUT_DIR: z._default(z.string(), "vocoder/mix"),
  SONGS_GENRES_FILE: z.optional(z.string()),
  SONGS_FALLBACK_GENRE: z._default(z.string(), "pop"),
  SONGS_PER_JOB_ESTIMATE_SECONDS: z._default(z.coerce.number(), 60),
  SONGS_WORKER_ENABLED: z._default(flag, true),

  INFERENCE_COMMAND: z._default(z.string(), "python"),
  INFERENCE_ARGS: z._default(z.string(), "infer.py"),
  INFERENCE_CWD: z.optional(z.string()),
  INFERENCE_STAGE1_MODEL: z._default(z.string(), "models/YuE-s1-7B-anneal-en-cot-exl2-8.0bpw"),
  INFERENCE_STAGE2_MODEL: z._default(z.string(), "models/YuE-s2-1B-general-exl2-8.0bpw"),
  INFERENCE_TIMEOUT_MS: z.optional(z.coerce.number()),
  INFERENCE_KILL_GRACE_MS: z._default(z.coerce.number(), 10_000),

  LYRICS_PROVIDER: z._default(z.enum(providerNames), "anthropic"),
  OPENAI_API_KEY: z.optional(z.string()),
  OPENAI_MODEL: z._default(z.string(), "gpt-4o"),
  ANTHROPIC_API_KEY: z.optional(z.string()),
  ANTHROPIC_MODEL: z._default(z.string(), "claude-3-5-sonnet-latest"),
  GOOGLE_API_KEY: z.optional(z.string()),
  GEMINI_MODEL: z._default(z.string(), "gemini-1.5-pro"),

  STORAGE_DRIVER: z._default(z.enum(storageDrivers), "none"),
  STORAGE_BUCKET: z._default(z.string(), "cantus-songs"),
  STORAGE_FS_ROOT: z._default(z.string(), "./storage"),
  GCS_PROJECT_ID: z.optional(z.string()),
  GCS_KEY_FILE: z.optional(z.string()),
  GCS_KEY_PREFIX: z.optional(z.string()),
})

export type EnvConfig = z.infer<typeof envSchema>

export type StorageConfig =
  | { driver: "none" }
  | { driver: "memory"; bucket: string }
  | { driver: "fs"; bucket: string; rootDir: string }
  | {
      driver: "gcs"
      bucket: string
      projectId?: string
      keyFilename?: string
      keyspacePrefix?: string
    }

export type AppConfig = {
  app: {
    env: string
  }

  server: {
    host: string
    port: number
    shutdownTimeoutMs: Milliseconds
    livenessPath: RoutePath
    readinessPath: RoutePath
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  requestId: {
    enabled: boolean
    header: string
    fallbackToTraceparent: boolean
  }

  requestLogging: {
    enabled: boolean
    level: LogLevelName
  }

  songs: {
    stateDir: string
    resultsFile: string
    outputDir: string
    nestedOutputDir: string
    genresFile: string
    fallbackGenre: string
    perJobEstimateSeconds: number
    worker: {
      enabled: boolean
    }
  }

  inference: {
    command: string
    commandArgs: string[]
    cwd?: string
    stage1Model: string
    stage2Model: string
    timeoutMs?: Milliseconds
    killGraceMs: Milliseconds
  }

  lyrics: {
    defaultProvider: ProviderName
    openai: { apiKey?: string; model: string }
    anthropic: { apiKey?: string; model: string }
    gemini: { apiKey?: string; model: string }
  }

  storage: StorageConfig
}
