import { type Context, parseOrThrow, type RequestHandler } from "@cantus/server"
import type { SongServices } from "../composition"
import { promptKindSchema, updatePromptRequestSchema } from "./lyrics.api.schema"
import { readJsonBody } from "./read-json-body"

type PromptBody = { prompt: string }

export function getPromptHandler({ promptStore }: SongServices): RequestHandler {
  return async (c: Context) => {
    const kind = parseOrThrow(promptKindSchema, c.req.param("kind"))

    return c.json<PromptBody>({ prompt: await promptStore.read(kind) })
  }
}

export function updatePromptHandler({ promptStore }: SongServices): RequestHandler {
  return async (c: Context) => {
    const kind = parseOrThrow(promptKindSchema, c.req.param("kind"))
    const { prompt } = parseOrThrow(updatePromptRequestSchema, await readJsonBody(c))

    await promptStore.write(kind, prompt)

    return c.json<PromptBody>({ prompt })
  }
}
