import type { SerpProvider, SerpSearchResult } from "./SerpProvider.js";
import { postJson } from "../http/fetchJson.js";

type SerperResponse = {
  organic?: Array<{ link?: string; title?: string; snippet?: string }>;
  knowledgeGraph?: { title?: string; type?: string; description?: string };
};

export const SERPER_URL = "https://google.serper.dev/search";

export class SerperProvider implements SerpProvider {
  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs = 30000
  ) {}

  async search(query: string): Promise<SerpSearchResult> {
    if (!this.apiKey) {
      throw new Error("SERPER_API_KEY is missing (required for ownership verification).");
    }

    const json = (await postJson(
      SERPER_URL,
      { "X-API-KEY": this.apiKey },
      { q: query, num: 10 },
      this.timeoutMs,
      "Serper"
    )) as SerperResponse;

    const organic = (json.organic || [])
      .slice(0, 10)
      .map(r => ({ link: r.link || "", title: r.title, snippet: r.snippet }));

    return { organic, knowledgeGraph: json.knowledgeGraph };
  }
}
