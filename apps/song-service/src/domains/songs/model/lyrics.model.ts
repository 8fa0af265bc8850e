export const providerNames = ["anthropic", "gemini", "openai"] as const
export type ProviderName = (typeof providerNames)[number]

export function isProviderName(value: string): value is ProviderName {
  return providerNames.some((name) => name === value)
}

/**
 * Text generation capability behind the lyrics stage. Every method may fail;
 * callers decide whether a failure is fatal.
 */
export interface LyricsProvider {
  readonly name: ProviderName

  generateLyrics(prompt: string, systemPrompt: string): Promise<string>

  /** Raw model answer; normalization is the caller's job. */
  extractGenre(prompt: string, genrePrompt: string): Promise<string>

  inferGenres(prompt: string): Promise<string[]>

  generateLyricsWithGenres(prompt: string, genres: readonly string[]): Promise<string>
}

export type CompletionRequest = {
  system: string
  user: string
  maxTokens: number
}

/** One system + user turn against a chat model, answered with plain text. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>
}

/** Fixed instruction texts the provider sends alongside the editable prompts. */
export type ProviderInstructions = {
  genreExtraction: string
  genreInference: string
  /** `{{genres}}` is replaced with the comma-separated genre list. */
  lyricsWithGenres: string
}

export const promptKinds = ["system", "genre"] as const
export type PromptKind = (typeof promptKinds)[number]

export interface PromptStore {
  read(kind: PromptKind): Promise<string>
  write(kind: PromptKind, text: string): Promise<void>
}

export type ProviderInfo = {
  provider: ProviderName | null
  availableProviders: ProviderName[]
}

export type SwitchProviderResult = {
  provider: ProviderName
  changed: boolean
  message: string
}

export type GeneratedLyrics = {
  lyrics: string
  suggestedGenre: string | null
  provider: ProviderName
  formatExplanation: string
}
