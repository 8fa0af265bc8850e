import type { AppConfig } from "../../../app/config"
import { readDataText } from "../../../lib"
import { AnthropicCompletionClient } from "../infra/completion-client.anthropic"
import { GeminiCompletionClient } from "../infra/completion-client.gemini"
import { OpenAiCompletionClient } from "../infra/completion-client.openai"
import type {
  CompletionClient,
  LyricsProvider,
  ProviderInstructions,
  ProviderName,
} from "../model/lyrics.model"
import { LlmLyricsProvider } from "../services/llm-lyrics-provider"

export async function loadProviderInstructions(): Promise<ProviderInstructions> {
  const [genreExtraction, genreInference, lyricsWithGenres] = await Promise.all([
    readDataText("prompts", "genre-extraction.txt"),
    readDataText("prompts", "genre-inference.txt"),
    readDataText("prompts", "lyrics-with-genres.txt"),
  ])

  return {
    genreExtraction: genreExtraction.trim(),
    genreInference: genreInference.trim(),
    lyricsWithGenres: lyricsWithGenres.trim(),
  }
}

function completionClients(config: AppConfig["lyrics"]): [ProviderName, CompletionClient][] {
  const clients: [ProviderName, CompletionClient][] = []
  const { openai, anthropic, gemini } = config

  if (openai.apiKey !== undefined) {
    clients.push(["openai", new OpenAiCompletionClient({ apiKey: openai.apiKey, model: openai.model })])
  }
  if (anthropic.apiKey !== undefined) {
    clients.push([
      "anthropic",
      new AnthropicCompletionClient({ apiKey: anthropic.apiKey, model: anthropic.model }),
    ])
  }
  if (gemini.apiKey !== undefined) {
    clients.push(["gemini", new GeminiCompletionClient({ apiKey: gemini.apiKey, model: gemini.model })])
  }

  return clients
}

/** One provider per vendor that has an API key. */
export async function createLyricsProviders(
  config: AppConfig["lyrics"],
): Promise<Map<ProviderName, LyricsProvider>> {
  const instructions = await loadProviderInstructions()
  const providers = new Map<ProviderName, LyricsProvider>()

  for (const [name, client] of completionClients(config)) {
    providers.set(name, new LlmLyricsProvider({ client }, { name, instructions }))
  }

  return providers
}
