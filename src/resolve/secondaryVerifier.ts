import type { ChatProvider } from "../llm/ChatProvider.js";
import type { SerpProvider, SerpSearchResult } from "../serp/SerpProvider.js";
import { SYNTHESIS_PARSE, parseGroupAnswer } from "../domain/parseResponse.js";
import { inferOwnershipFromSnippets } from "../domain/ownership.js";
import { type GroupAnswer, type RestaurantIdentity, INDEPENDENT } from "../domain/records.js";
import type { Logger } from "../log/logger.js";

export type VerificationSource = "synthesis" | "heuristic" | "no_results" | "search_failed" | "unavailable";

export type VerificationResult = GroupAnswer & { source: VerificationSource };

const MAX_SNIPPETS = 8;
const SYNTHESIS_SNIPPETS = 5;

const SYNTHESIS_SYSTEM =
  "You read web search results and decide whether a restaurant belongs to a restaurant or hospitality group. " +
  "Answer only in the requested two-line format.";

export function buildVerificationQuery(r: RestaurantIdentity): string {
  const location = r.market ? ` ${r.market}` : "";
  return `"${r.name}"${location} restaurant group owner parent company hospitality`;
}

export function collectSnippets(res: SerpSearchResult): string[] {
  const snippets = res.organic
    .slice(0, MAX_SNIPPETS)
    .map(o => [o.title, o.snippet].filter(Boolean).join(" - "))
    .filter(Boolean);

  const kg = res.knowledgeGraph;
  if (kg) {
    const panel = [kg.title, kg.type, kg.description].filter(Boolean).join(" - ");
    if (panel) snippets.push(panel);
  }
  return snippets;
}

export function buildSynthesisPrompt(r: RestaurantIdentity, snippets: string[]): string {
  const where = r.market ? ` in ${r.market}` : "";
  const numbered = snippets
    .slice(0, SYNTHESIS_SNIPPETS)
    .map((s, i) => `${i + 1}. ${s}`)
    .join("\n");

  return `Based on these search results about "${r.name}" restaurant${where}:

${numbered}

Do these results indicate that the restaurant is owned or operated by a restaurant group, hospitality group or management company?

Respond in this exact format:
Group Name: [exact name of the parent company/group, or "Independent" if the results show no group ownership]
Total Locations: [number of restaurants the group operates, "1" if independent, or "Unknown"]`;
}

function confirmIndependent(source: VerificationSource): VerificationResult {
  return { group: INDEPENDENT, locations: "1", source };
}

/**
 * Second opinion for restaurants the primary backend called "Independent".
 * Best effort: every failure path confirms independence.
 */
export class SecondaryVerifier {
  constructor(
    private readonly serp: SerpProvider | undefined,
    private readonly synthesis: ChatProvider | undefined,
    private readonly log: Logger
  ) {}

  get available(): boolean {
    return this.serp !== undefined;
  }

  async verify(restaurant: RestaurantIdentity): Promise<VerificationResult> {
    try {
      return await this.verifyUnsafe(restaurant);
    } catch (err) {
      this.log.warn(`  Verification error for ${restaurant.name}: ${err instanceof Error ? err.message : String(err)}`);
      return confirmIndependent("search_failed");
    }
  }

  private async verifyUnsafe(restaurant: RestaurantIdentity): Promise<VerificationResult> {
    if (!this.serp) return confirmIndependent("unavailable");

    let res: SerpSearchResult;
    try {
      res = await this.serp.search(buildVerificationQuery(restaurant));
    } catch (err) {
      this.log.warn(`  Serper search failed: ${err instanceof Error ? err.message : String(err)}`);
      return confirmIndependent("search_failed");
    }

    const snippets = collectSnippets(res);
    if (!snippets.length) return confirmIndependent("no_results");

    if (this.synthesis) {
      try {
        const answer = await this.synthesis.complete({
          system: SYNTHESIS_SYSTEM,
          prompt: buildSynthesisPrompt(restaurant, snippets),
          maxTokens: 300,
          temperature: 0.1
        });
        const parsed = parseGroupAnswer(answer, SYNTHESIS_PARSE);
        if (parsed.group === INDEPENDENT) return confirmIndependent("synthesis");
        return { ...parsed, source: "synthesis" };
      } catch (err) {
        this.log.warn(`  Synthesis (${this.synthesis.name}) failed, using keyword heuristic: ${err instanceof Error ? err.message : String(err)}`);
      }
    }

    const guess = inferOwnershipFromSnippets(restaurant.name, snippets);
    if (guess.group === INDEPENDENT) return confirmIndependent("heuristic");
    return { ...guess, source: "heuristic" };
  }
}
