import { AnthropicCompletionClient, type AnthropicMessagesApi } from "../completion-client.anthropic"
import { type GeminiModelFactory, GeminiCompletionClient } from "../completion-client.gemini"
import { type OpenAiChatApi, OpenAiCompletionClient } from "../completion-client.openai"

const request = { system: "You write lyrics.", user: "a song about rain", maxTokens: 800 }

describe("OpenAiCompletionClient", () => {
  let create: ReturnType<typeof vi.fn<OpenAiChatApi["chat"]["completions"]["create"]>>
  let client: OpenAiCompletionClient

  beforeEach(() => {
    create = vi.fn<OpenAiChatApi["chat"]["completions"]["create"]>()
    client = new OpenAiCompletionClient(
      { apiKey: "test-key", model: "gpt-4o" },
      { chat: { completions: { create } } },
    )
  })

  it("sends the system and user turns", async () => {
    create.mockResolvedValue({ choices: [{ message: { content: "[verse]\nRain" } }] })

    expect(await client.complete(request)).toBe("[verse]\nRain")
    expect(create).toHaveBeenCalledWith({
      model: "gpt-4o",
      max_tokens: 800,
      messages: [
        { role: "system", content: "You write lyrics." },
        { role: "user", content: "a song about rain" },
      ],
    })
  })

  it("returns an empty string for a null message", async () => {
    create.mockResolvedValue({ choices: [{ message: { content: null } }] })

    expect(await client.complete(request)).toBe("")
  })

  it("returns an empty string when there are no choices", async () => {
    create.mockResolvedValue({ choices: [] })

    expect(await client.complete(request)).toBe("")
  })
})

describe("AnthropicCompletionClient", () => {
  let create: ReturnType<typeof vi.fn<AnthropicMessagesApi["messages"]["create"]>>
  let client: AnthropicCompletionClient

  beforeEach(() => {
    create = vi.fn<AnthropicMessagesApi["messages"]["create"]>()
    client = new AnthropicCompletionClient(
      { apiKey: "test-key", model: "claude-3-5-sonnet-latest" },
      { messages: { create } },
    )
  })

  it("passes the system prompt separately", async () => {
    create.mockResolvedValue({ content: [{ type: "text", text: "Rain" }] })

    await client.complete(request)

    expect(create).toHaveBeenCalledWith({
      model: "claude-3-5-sonnet-latest",
      max_tokens: 800,
      system: "You write lyrics.",
      messages: [{ role: "user", content: "a song about rain" }],
    })
  })

  it("joins text blocks and skips the others", async () => {
    create.mockResolvedValue({
      content: [
        { type: "text", text: "[verse]\n" },
        { type: "tool_use" },
        { type: "text", text: "Rain" },
      ],
    })

    expect(await client.complete(request)).toBe("[verse]\nRain")
  })
})

describe("GeminiCompletionClient", () => {
  it("configures the model and returns the response text", async () => {
    const generateContent = vi.fn(async (_prompt: string) => ({
      response: { text: () => "[chorus]\nRain" },
    }))
    const getGenerativeModel = vi.fn<GeminiModelFactory["getGenerativeModel"]>(() => ({
      generateContent,
    }))
    const client = new GeminiCompletionClient(
      { apiKey: "test-key", model: "gemini-1.5-pro" },
      { getGenerativeModel },
    )

    expect(await client.complete(request)).toBe("[chorus]\nRain")
    expect(getGenerativeModel).toHaveBeenCalledWith({
      model: "gemini-1.5-pro",
      systemInstruction: "You write lyrics.",
      generationConfig: { maxOutputTokens: 800 },
    })
    expect(generateContent).toHaveBeenCalledWith("a song about rain")
  })
})
