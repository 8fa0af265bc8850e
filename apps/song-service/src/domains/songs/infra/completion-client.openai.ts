import OpenAI from "openai"
import type { CompletionClient, CompletionRequest } from "../model/lyrics.model"

export type OpenAiCompletionClientOptions = {
  apiKey: string
  model: string
}

type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string }

/** The chat completions surface of the `openai` client this adapter calls. */
export interface OpenAiChatApi {
  chat: {
    completions: {
      create(body: {
        model: string
        max_tokens: number
        messages: ChatMessage[]
      }): Promise<{ choices: { message: { content: string | null } }[] }>
    }
  }
}

export class OpenAiCompletionClient implements CompletionClient {
  private readonly client: OpenAiChatApi

  constructor(
    private readonly opts: OpenAiCompletionClientOptions,
    client?: OpenAiChatApi,
  ) {
    this.client = client ?? new OpenAI({ apiKey: opts.apiKey })
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.opts.model,
      max_tokens: request.maxTokens,
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.user },
      ],
    })

    return response.choices[0]?.message.content ?? ""
  }
}
