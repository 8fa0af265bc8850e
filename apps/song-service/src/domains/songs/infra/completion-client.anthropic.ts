import Anthropic from "@anthropic-ai/sdk"
import type { CompletionClient, CompletionRequest } from "../model/lyrics.model"

export type AnthropicCompletionClientOptions = {
  apiKey: string
  model: string
}

/** Text blocks carry `text`; tool and thinking blocks do not. */
type ContentBlock = { type: string; text?: unknown }

export interface AnthropicMessagesApi {
  messages: {
    create(body: {
      model: string
      max_tokens: number
      system: string
      messages: { role: "user"; content: string }[]
    }): Promise<{ content: ContentBlock[] }>
  }
}

export class AnthropicCompletionClient implements CompletionClient {
  private readonly client: AnthropicMessagesApi

  constructor(
    private readonly opts: AnthropicCompletionClientOptions,
    client?: AnthropicMessagesApi,
  ) {
    this.client = client ?? new Anthropic({ apiKey: opts.apiKey })
  }

  async complete(request: CompletionRequest): Promise<string> {
    const message = await this.client.messages.create({
      model: this.opts.model,
      max_tokens: request.maxTokens,
      system: request.system,
      messages: [{ role: "user", content: request.user }],
    })

    return message.content
      .flatMap((block) =>
        block.type === "text" && typeof block.text === "string" ? [block.text] : [],
      )
      .join("")
  }
}
