import { errorMessage } from "@cantus/errors"
import type { Logger } from "@cantus/logger"
import type { Mutex } from "../../../lib"
import {
  type GeneratedLyrics,
  type LyricsProvider,
  type PromptStore,
  type ProviderInfo,
  type ProviderName,
  providerNames,
  type SwitchProviderResult,
} from "../model/lyrics.model"
import { ProviderError } from "../model/song.errors"
import type { GenreMatcher } from "./genre-matcher"

export type LyricsServiceDeps = {
  /** Only providers that have credentials. */
  providers: ReadonlyMap<ProviderName, LyricsProvider>
  promptStore: PromptStore
  genreMatcher: GenreMatcher
  mutex: Mutex
  logger: Logger
}

export type LyricsServiceOptions = {
  defaultProvider: ProviderName
}

export type WrittenLyrics = {
  lyrics: string
  provider: ProviderName
}

export const FORMAT_EXPLANATION =
  "Lyrics are split into [verse], [chorus], [bridge] and [outro] sections separated by blank lines."

/**
 * Owns the active lyrics provider. The provider can be swapped at runtime;
 * calls already in flight finish on the provider they started with.
 */
export class LyricsService {
  private active: LyricsProvider | undefined

  constructor(
    private readonly deps: LyricsServiceDeps,
    opts: LyricsServiceOptions,
  ) {
    this.active = deps.providers.get(opts.defaultProvider) ?? [...deps.providers.values()][0]
  }

  providerInfo(): ProviderInfo {
    return {
      provider: this.active?.name ?? null,
      availableProviders: providerNames.filter((name) => this.deps.providers.has(name)),
    }
  }

  get activeProviderName(): ProviderName | undefined {
    return this.active?.name
  }

  async switchProvider(name: ProviderName): Promise<SwitchProviderResult> {
    const next = this.deps.providers.get(name)
    if (!next) throw ProviderError.notConfigured(name)

    return this.deps.mutex.run(async () => {
      if (this.active?.name === name) {
        return { provider: name, changed: false, message: `Provider ${name} is already active` }
      }

      this.deps.logger.info("Switching lyrics provider", { from: this.active?.name, to: name })
      this.active = next

      return { provider: name, changed: true, message: `Successfully switched provider to ${name}` }
    })
  }

  /** @throws {ProviderError} */
  async writeLyrics(prompt: string): Promise<WrittenLyrics> {
    const provider = this.requireProvider()
    const systemPrompt = await this.deps.promptStore.read("system")
    const lyrics = await provider.generateLyrics(prompt, systemPrompt)

    return { lyrics, provider: provider.name }
  }

  /** Lyrics plus a best-effort genre suggestion. */
  async generateLyrics(prompt: string): Promise<GeneratedLyrics> {
    const { lyrics, provider } = await this.writeLyrics(prompt)
    const suggestedGenre = await this.suggestGenre(prompt)

    return { lyrics, suggestedGenre, provider, formatExplanation: FORMAT_EXPLANATION }
  }

  /**
   * First word of the provider's answer, normalized. `null` when the provider
   * fails or answers with nothing usable.
   */
  async suggestGenre(prompt: string): Promise<string | null> {
    try {
      const provider = this.requireProvider()
      const genrePrompt = await this.deps.promptStore.read("genre")
      const answer = await provider.extractGenre(prompt, genrePrompt)
      const word = answer.trim().split(/\s+/)[0]?.toLowerCase() ?? ""

      return word ? this.deps.genreMatcher.match(word) : null
    } catch (err) {
      this.deps.logger.warn("Genre extraction failed", { reason: errorMessage(err) })
      return null
    }
  }

  /** Matched genres for the prompt, or the fallback genre alone. */
  async inferGenres(prompt: string): Promise<string[]> {
    try {
      const raw = await this.requireProvider().inferGenres(prompt)
      return this.deps.genreMatcher.matchMany(raw)
    } catch (err) {
      this.deps.logger.warn("Genre inference failed", { reason: errorMessage(err) })
      return [this.deps.genreMatcher.fallback]
    }
  }

  /** @throws {ProviderError} */
  async writeLyricsWithGenres(prompt: string, genres: readonly string[]): Promise<WrittenLyrics> {
    const provider = this.requireProvider()
    const lyrics = await provider.generateLyricsWithGenres(prompt, genres)

    return { lyrics, provider: provider.name }
  }

  private requireProvider(): LyricsProvider {
    if (!this.active) throw ProviderError.noneActive()
    return this.active
  }
}
