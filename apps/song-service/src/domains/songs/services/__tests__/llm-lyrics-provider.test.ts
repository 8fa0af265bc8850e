import { beforeEach, describe, expect, it } from "vitest"
import { mock, type MockProxy } from "vitest-mock-extended"
import type { CompletionClient } from "../../model/lyrics.model"
import { ProviderError } from "../../model/song.errors"
import { LlmLyricsProvider } from "../llm-lyrics-provider"

describe("LlmLyricsProvider", () => {
  let client: MockProxy<CompletionClient>
  let provider: LlmLyricsProvider

  beforeEach(() => {
    client = mock<CompletionClient>()
    provider = new LlmLyricsProvider(
      { client },
      {
        name: "openai",
        instructions: {
          genreExtraction: "Name one genre.",
          genreInference: "List genres.",
          lyricsWithGenres: "Write lyrics in {{genres}} style. Blend {{genres}}.",
        },
      },
    )
  })

  it("asks for lyrics with the system prompt", async () => {
    client.complete.mockResolvedValue("  [verse]\nla la  \n")

    const lyrics = await provider.generateLyrics("the sea", "You write songs.")

    expect(lyrics).toBe("[verse]\nla la")
    expect(client.complete).toHaveBeenCalledWith({
      system: "You write songs.",
      user: "Prompt: the sea",
      maxTokens: 1024,
    })
  })

  it("appends the genre prompt to the extraction instruction", async () => {
    client.complete.mockResolvedValue("rock")

    await provider.extractGenre("loud guitars", " POP ")
    await provider.extractGenre("loud guitars", "  ")

    expect(client.complete.mock.calls.map(([req]) => req.system)).toEqual([
      "Name one genre.\n\nPOP",
      "Name one genre.",
    ])
    expect(client.complete.mock.calls[0]?.[0].maxTokens).toBe(50)
  })

  it("splits inferred genres on commas", async () => {
    client.complete.mockResolvedValue("Rock, Electronic , ,Indie")

    await expect(provider.inferGenres("x")).resolves.toEqual(["rock", "electronic", "indie"])
    expect(client.complete.mock.calls[0]?.[0].maxTokens).toBe(100)
  })

  it("fills every genre placeholder", async () => {
    client.complete.mockResolvedValue("[verse]\nok")

    await provider.generateLyricsWithGenres("x", ["rock", "jazz"])

    expect(client.complete.mock.calls[0]?.[0].system).toBe(
      "Write lyrics in rock, jazz style. Blend rock, jazz.",
    )
  })

  it("wraps client failures", async () => {
    client.complete.mockRejectedValue(new Error("timeout"))

    const err = await provider.generateLyrics("x", "s").catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ProviderError)
    expect(err).toMatchObject({
      code: "provider_failed",
      message: "openai lyrics generation failed: timeout",
    })
  })

  it("treats a blank answer as a failure", async () => {
    client.complete.mockResolvedValue(" \n ")

    await expect(provider.inferGenres("x")).rejects.toMatchObject({
      code: "provider_failed",
      message: "openai genre inference returned no text",
    })
  })
})
