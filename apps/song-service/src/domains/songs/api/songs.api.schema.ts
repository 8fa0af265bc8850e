import { z } from "zod/mini"
import { cacheModes } from "../model/job.model"

const positiveInt = (field: string) =>
  z.int().check(z.positive({ error: `${field} must be a positive integer` }))

export const inferenceParamsSchema = z.object({
  stage1Model: z.optional(z.string().check(z.minLength(1))),
  stage2Model: z.optional(z.string().check(z.minLength(1))),
  stage2BatchSize: z.optional(positiveInt("stage2BatchSize")),
  runNSegments: z.optional(positiveInt("runNSegments")),
  maxNewTokens: z.optional(positiveInt("maxNewTokens")),
  repetitionPenalty: z.optional(z.number().check(z.positive())),
  stage2CacheSize: z.optional(positiveInt("stage2CacheSize")),
  stage1CacheSize: z.optional(positiveInt("stage1CacheSize")),
  stage1CacheMode: z.optional(z.enum(cacheModes)),
  stage2CacheMode: z.optional(z.enum(cacheModes)),
  cudaIdx: z.optional(z.int().check(z.nonnegative())),
  stage1NoGuidance: z.optional(z.boolean()),
  keepIntermediate: z.optional(z.boolean()),
  disableOffloadModel: z.optional(z.boolean()),
})

const submissionFields = {
  userId: z.optional(z.string().check(z.maxLength(128))),
  songName: z.optional(z.string().check(z.maxLength(256))),
  params: z.optional(inferenceParamsSchema),
}

// Genre/lyrics/prompt completeness is checked by the orchestrator.
export const submitSongRequestSchema = z.object({
  genre: z.optional(z.string()),
  lyrics: z.optional(z.string()),
  prompt: z.optional(z.string()),
  ...submissionFields,
})

export type SubmitSongBody = z.infer<typeof submitSongRequestSchema>

export const withGenresRequestSchema = z.object({
  prompt: z.string().check(z.trim(), z.minLength(1, { error: "Prompt cannot be empty" })),
  genres: z.optional(z.array(z.string({ error: "Genres must be strings" }))),
  ...submissionFields,
})

export type WithGenresBody = z.infer<typeof withGenresRequestSchema>

export const downloadQuerySchema = z.object({
  type: z.optional(z.string().check(z.trim(), z.minLength(1, { error: "Type cannot be empty" }))),
})
