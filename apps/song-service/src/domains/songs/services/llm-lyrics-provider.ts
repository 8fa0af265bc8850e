import type {
  CompletionClient,
  CompletionRequest,
  LyricsProvider,
  ProviderInstructions,
  ProviderName,
} from "../model/lyrics.model"
import { ProviderError } from "../model/song.errors"

export type LlmLyricsProviderDeps = {
  client: CompletionClient
}

export type LlmLyricsProviderOptions = {
  name: ProviderName
  instructions: ProviderInstructions
}

const MAX_TOKENS = {
  lyrics: 1024,
  genre: 50,
  genres: 100,
} as const

/**
 * {@link LyricsProvider} on top of any chat completion API. Failures and
 * blank answers surface as {@link ProviderError}.
 */
export class LlmLyricsProvider implements LyricsProvider {
  constructor(
    private readonly deps: LlmLyricsProviderDeps,
    private readonly opts: LlmLyricsProviderOptions,
  ) {}

  get name(): ProviderName {
    return this.opts.name
  }

  generateLyrics(prompt: string, systemPrompt: string): Promise<string> {
    return this.ask("lyrics generation", {
      system: systemPrompt,
      user: `Prompt: ${prompt}`,
      maxTokens: MAX_TOKENS.lyrics,
    })
  }

  extractGenre(prompt: string, genrePrompt: string): Promise<string> {
    const extra = genrePrompt.trim()
    const base = this.opts.instructions.genreExtraction.trim()

    return this.ask("genre extraction", {
      system: extra ? `${base}\n\n${extra}` : base,
      user: `Prompt: ${prompt}`,
      maxTokens: MAX_TOKENS.genre,
    })
  }

  async inferGenres(prompt: string): Promise<string[]> {
    const answer = await this.ask("genre inference", {
      system: this.opts.instructions.genreInference,
      user: `Prompt: ${prompt}`,
      maxTokens: MAX_TOKENS.genres,
    })

    return answer
      .split(",")
      .map((genre) => genre.trim().toLowerCase())
      .filter((genre) => genre !== "")
  }

  generateLyricsWithGenres(prompt: string, genres: readonly string[]): Promise<string> {
    return this.ask("lyrics generation", {
      system: this.opts.instructions.lyricsWithGenres.replaceAll("{{genres}}", genres.join(", ")),
      user: `Prompt: ${prompt}`,
      maxTokens: MAX_TOKENS.lyrics,
    })
  }

  private async ask(operation: string, request: CompletionRequest): Promise<string> {
    let answer: string

    try {
      answer = await this.deps.client.complete(request)
    } catch (err) {
      throw ProviderError.requestFailed(this.name, operation, err)
    }

    const trimmed = answer.trim()
    if (!trimmed) throw ProviderError.emptyResponse(this.name, operation)

    return trimmed
  }
}
