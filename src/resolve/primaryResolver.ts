import type { ChatProvider } from "../llm/ChatProvider.js";
import { HttpStatusError } from "../http/fetchJson.js";
import { PRIMARY_PARSE, parseGroupAnswer } from "../domain/parseResponse.js";
import { type GroupAnswer, type RestaurantIdentity, errorAnswer } from "../domain/records.js";
import type { Logger } from "../log/logger.js";

const SYSTEM_PROMPT =
  "You are a restaurant industry researcher. Answer only in the requested two-line format: " +
  "a line starting with \"Group Name:\" and a line starting with \"Total Locations:\". No other text.";

export function buildResearchPrompt(r: RestaurantIdentity): string {
  const locationStr = r.market ? ` in ${r.market}` : "";
  const domainStr = r.domain ? ` (website: ${r.domain})` : "";

  return `Search for information about "${r.name}" restaurant${locationStr}${domainStr}.

Please determine:
1. Is this restaurant part of a larger hospitality/restaurant group or management company?
2. If yes, what is the exact name of the parent company or restaurant group?
3. Approximately how many total restaurant locations does this group operate?

Respond in this exact format:
Group Name: [exact name of parent company/group, or "Independent" if it's a standalone restaurant]
Total Locations: [number, or "1" if independent, or "Unknown" if you can't find this info]

Be concise and only provide the requested information.`;
}

export class PrimaryResolver {
  constructor(
    // Undefined when no credential is configured for the primary backend.
    private readonly provider: ChatProvider | undefined,
    private readonly log: Logger
  ) {}

  /** Never throws; failures come back as an `ERROR:` sentinel group. */
  async resolve(restaurant: RestaurantIdentity): Promise<GroupAnswer> {
    if (!this.provider) return errorAnswer("No API key");

    try {
      const answer = await this.provider.complete({
        system: SYSTEM_PROMPT,
        prompt: buildResearchPrompt(restaurant),
        maxTokens: 500,
        temperature: 0.1
      });
      return parseGroupAnswer(answer, PRIMARY_PARSE);
    } catch (err) {
      if (err instanceof HttpStatusError) {
        this.log.warn(`  API Error ${err.status}: ${err.body.slice(0, 200)}`);
        return errorAnswer(String(err.status));
      }
      const message = err instanceof Error ? err.message : String(err);
      this.log.warn(`  Error processing ${restaurant.name}: ${message}`);
      return errorAnswer(message);
    }
  }
}
