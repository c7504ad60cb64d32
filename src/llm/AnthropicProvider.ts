import type { ChatProvider, ChatRequest } from "./ChatProvider.js";
import { postJson } from "../http/fetchJson.js";

type AnthropicResponse = {
  content?: Array<{ type?: string; text?: string }>;
};

export const ANTHROPIC_URL = "https://api.anthropic.com/v1/messages";
export const ANTHROPIC_DEFAULT_MODEL = "claude-sonnet-4-20250514";

export class AnthropicProvider implements ChatProvider {
  readonly name = "anthropic";

  constructor(
    private readonly apiKey: string,
    private readonly model: string = ANTHROPIC_DEFAULT_MODEL,
    private readonly timeoutMs = 60000
  ) {}

  async complete(req: ChatRequest): Promise<string> {
    const json = (await postJson(
      ANTHROPIC_URL,
      { "x-api-key": this.apiKey, "anthropic-version": "2023-06-01" },
      {
        model: this.model,
        max_tokens: req.maxTokens,
        temperature: req.temperature,
        system: req.system,
        messages: [{ role: "user", content: req.prompt }]
      },
      this.timeoutMs,
      "Anthropic"
    )) as AnthropicResponse;

    // Text blocks only; tool-use blocks carry no answer text.
    const text = (json.content || [])
      .filter(b => b.type === "text" || b.type === undefined)
      .map(b => b.text || "")
      .join("\n");
    return text.trim();
  }
}
