import { type GroupAnswer, INDEPENDENT, MANUAL_REVIEW_GROUP, UNKNOWN } from "./records.js";

// Phrases in search snippets that suggest a restaurant sits inside a larger operator.
export const OWNERSHIP_KEYWORDS = [
  "restaurant group",
  "hospitality group",
  "parent company",
  "owned by",
  "operates",
  "portfolio",
  "management company",
  "dining group",
  "restaurant family",
  "restaurant collection"
];

const COMPANY_SUFFIX = "Group|Hospitality|Restaurant|Management|Collection|Dining|Company|LLC|Inc";
const CAP_WORD = "[A-Z][A-Za-z0-9&'’-]*";
// Greedy so "Torrisi Restaurant Group" wins over "Torrisi Restaurant". Blanks only
// between words: a name never crosses a line break or the " - " between title and snippet.
const COMPANY_NAME = `\\b${CAP_WORD}(?:[ \\t]+${CAP_WORD})*[ \\t]+(?:${COMPANY_SUFFIX})\\b`;

// Written without the `i` flag: the name itself must stay capitalized.
const VERB_THEN_NAME = new RegExp(
  `(?:[Oo]wned by|[Pp]art of|[Oo]perates|[Mm]anaged by|[Oo]wns|[Mm]anages)[ \\t]+(?:the[ \\t]+)?(${COMPANY_NAME})`
);
const NAME_THEN_VERB = new RegExp(`(${COMPANY_NAME})[ \\t]+(?:owns|operates|manages)\\b`);

export function extractOwnerName(text: string): string | undefined {
  for (const re of [VERB_THEN_NAME, NAME_THEN_VERB]) {
    const m = re.exec(text);
    const name = m?.[1]?.replace(/^The[ \t]+/, "").trim();
    if (name) return name;
  }
  return undefined;
}

/**
 * Last-resort ownership guess from raw search snippets when no model is available
 * to read them. Requires the restaurant to be mentioned at all before trusting any
 * ownership phrase. Names are extracted one snippet at a time, in order.
 */
export function inferOwnershipFromSnippets(restaurantName: string, snippets: string[]): GroupAnswer {
  const joined = snippets.join(" ");
  const lower = joined.toLowerCase();

  const nameHit = !!restaurantName.trim() && lower.includes(restaurantName.trim().toLowerCase());
  const keywordHit = OWNERSHIP_KEYWORDS.some(k => lower.includes(k));

  if (!nameHit || !keywordHit) return { group: INDEPENDENT, locations: "1" };

  for (const snippet of snippets) {
    const owner = extractOwnerName(snippet);
    if (owner) return { group: owner, locations: UNKNOWN };
  }

  return { group: MANUAL_REVIEW_GROUP, locations: UNKNOWN };
}
