import type { ChatProvider, ChatRequest } from "./ChatProvider.js";
import { postJson } from "../http/fetchJson.js";

type PerplexityResponse = {
  choices?: Array<{ message?: { content?: string } }>;
};

export const PERPLEXITY_URL = "https://api.perplexity.ai/chat/completions";
export const PERPLEXITY_DEFAULT_MODEL = "sonar";

export class PerplexityProvider implements ChatProvider {
  readonly name = "perplexity";

  constructor(
    private readonly apiKey: string,
    private readonly model: string = PERPLEXITY_DEFAULT_MODEL,
    private readonly timeoutMs = 60000
  ) {}

  async complete(req: ChatRequest): Promise<string> {
    const json = (await postJson(
      PERPLEXITY_URL,
      { Authorization: `Bearer ${this.apiKey}` },
      {
        model: this.model,
        messages: [
          { role: "system", content: req.system },
          { role: "user", content: req.prompt }
        ],
        max_tokens: req.maxTokens,
        temperature: req.temperature
      },
      this.timeoutMs,
      "Perplexity"
    )) as PerplexityResponse;

    return (json.choices?.[0]?.message?.content || "").trim();
  }
}
