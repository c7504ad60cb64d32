import { type GroupAnswer, INDEPENDENT, UNKNOWN } from "./records.js";

const GROUP_LABEL = "Group Name:";
const LOCATIONS_LABEL = "Total Locations:";

export type ParseOptions = {
  // Returned when the answer has no "Group Name:" line and no other signal.
  defaults: GroupAnswer;
  // Locations value when a group line is present but the count line is not.
  missingLocations: string;
  // Use the first sentence of a long unstructured answer as the group name.
  freeformFallback: boolean;
};

export const PRIMARY_PARSE: ParseOptions = {
  defaults: { group: UNKNOWN, locations: "" },
  missingLocations: "",
  freeformFallback: true
};

export const SYNTHESIS_PARSE: ParseOptions = {
  defaults: { group: INDEPENDENT, locations: "1" },
  missingLocations: UNKNOWN,
  freeformFallback: false
};

function cleanValue(s: string): string {
  return s.replace(/\*/g, "").trim();
}

/**
 * Reads the two-line `Group Name:` / `Total Locations:` answer format.
 * Models drift from the format regularly, so anything unrecognised degrades to
 * `options.defaults` instead of throwing.
 */
export function parseGroupAnswer(text: string, options: ParseOptions = PRIMARY_PARSE): GroupAnswer {
  const answer = (text || "").trim();

  let group: string | undefined;
  let locations: string | undefined;

  for (const raw of answer.split("\n")) {
    const line = raw.trim();
    if (line.startsWith(GROUP_LABEL)) {
      const v = cleanValue(line.slice(GROUP_LABEL.length));
      if (v) group = v;
    } else if (line.startsWith(LOCATIONS_LABEL)) {
      const v = cleanValue(line.slice(LOCATIONS_LABEL.length));
      if (v) locations = v;
    }
  }

  if (group !== undefined) {
    return { group, locations: locations ?? options.missingLocations };
  }

  const lower = answer.toLowerCase();
  if (lower.includes("independent")) {
    return { group: INDEPENDENT, locations: "1" };
  }

  if (options.freeformFallback && answer.length > 100) {
    const firstSentence = cleanValue(answer.split(/[.\n]/)[0] ?? "");
    if (firstSentence) {
      return { group: firstSentence, locations: locations ?? options.defaults.locations };
    }
  }

  return { group: options.defaults.group, locations: locations ?? options.defaults.locations };
}
