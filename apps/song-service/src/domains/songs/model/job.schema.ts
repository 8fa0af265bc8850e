import { z } from "zod/mini"
import { cacheModes, SongJobId, type SongJob } from "./job.model"
import { providerNames } from "./lyrics.model"

const inferenceParamsSchema = z.object({
  stage1Model: z.optional(z.string()),
  stage2Model: z.optional(z.string()),
  stage2BatchSize: z.number(),
  runNSegments: z.number(),
  maxNewTokens: z.number(),
  repetitionPenalty: z.number(),
  stage2CacheSize: z.number(),
  stage1CacheSize: z.optional(z.number()),
  stage1CacheMode: z.optional(z.enum(cacheModes)),
  stage2CacheMode: z.optional(z.enum(cacheModes)),
  cudaIdx: z.optional(z.number()),
  stage1NoGuidance: z.optional(z.boolean()),
  keepIntermediate: z.optional(z.boolean()),
  disableOffloadModel: z.optional(z.boolean()),
})

const songInputSchema = z.union([
  z.object({
    source: z.literal("explicit"),
    userId: z.string(),
    songName: z.string(),
    params: inferenceParamsSchema,
    genre: z.string(),
    lyrics: z.string(),
    prompt: z.optional(z.string()),
  }),
  z.object({
    source: z.literal("prompt"),
    userId: z.string(),
    songName: z.string(),
    params: inferenceParamsSchema,
    prompt: z.string(),
    genre: z.optional(z.string()),
    lyrics: z.optional(z.string()),
  }),
])

const artifactLocationSchema = z.object({
  localPath: z.string(),
  remote: z.optional(z.object({ bucket: z.string(), key: z.string() })),
})

const baseShape = {
  id: z.custom<SongJobId>((v) => SongJobId.is(v)),
  input: songInputSchema,
  submittedAt: z.date(),
  usedGenres: z.optional(z.array(z.string())),
  genresWereInferred: z.optional(z.boolean()),
  lyricsProvider: z.optional(z.enum(providerNames)),
  remoteFolder: z.optional(z.string()),
}

const songJobSchema = z.union([
  z.object({ ...baseShape, status: z.literal("queued") }),
  z.object({
    ...baseShape,
    status: z.enum(["processing", "generating_lyrics", "generating_audio", "uploading"]),
    startedAt: z.date(),
  }),
  z.object({
    ...baseShape,
    status: z.literal("complete"),
    startedAt: z.date(),
    completedAt: z.date(),
    outputManifest: z.record(z.string(), artifactLocationSchema),
  }),
  z.object({
    ...baseShape,
    status: z.literal("error"),
    startedAt: z.optional(z.date()),
    completedAt: z.date(),
    error: z.string(),
  }),
])

export const jobSnapshotSchema = z.object({
  version: z.literal(1),
  jobs: z.array(songJobSchema),
})

/** On-disk form of the result store. */
export type JobSnapshot = {
  version: 1
  jobs: SongJob[]
}

export function parseJobSnapshot(value: unknown): JobSnapshot {
  return jobSnapshotSchema.parse(value)
}
