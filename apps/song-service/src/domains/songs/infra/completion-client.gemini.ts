import { GoogleGenerativeAI } from "@google/generative-ai"
import type { CompletionClient, CompletionRequest } from "../model/lyrics.model"

export type GeminiCompletionClientOptions = {
  apiKey: string
  model: string
}

export interface GeminiModelFactory {
  getGenerativeModel(params: {
    model: string
    systemInstruction: string
    generationConfig: { maxOutputTokens: number }
  }): {
    generateContent(prompt: string): Promise<{ response: { text(): string } }>
  }
}

export class GeminiCompletionClient implements CompletionClient {
  private readonly client: GeminiModelFactory

  constructor(
    private readonly opts: GeminiCompletionClientOptions,
    client?: GeminiModelFactory,
  ) {
    this.client = client ?? new GoogleGenerativeAI(opts.apiKey)
  }

  async complete(request: CompletionRequest): Promise<string> {
    const model = this.client.getGenerativeModel({
      model: this.opts.model,
      systemInstruction: request.system,
      generationConfig: { maxOutputTokens: request.maxTokens },
    })

    const result = await model.generateContent(request.user)
    return result.response.text()
  }
}
