import { z } from "zod/mini"
import { promptKinds } from "../model/lyrics.model"

export const generateLyricsRequestSchema = z.object({
  prompt: z.string().check(z.trim(), z.minLength(1, { error: "Prompt cannot be empty" })),
})

export const switchProviderRequestSchema = z.object({
  provider: z.string().check(z.trim(), z.toLowerCase(), z.minLength(1, { error: "Provider is required" })),
})

export const promptKindSchema = z.enum(promptKinds, {
  error: `Prompt kind must be one of: ${promptKinds.join(", ")}`,
})

export const updatePromptRequestSchema = z.object({
  prompt: z.string().check(z.trim(), z.minLength(1, { error: "Prompt cannot be empty" })),
})
