import { describe, it, expect } from "vitest";
import { PRIMARY_PARSE, SYNTHESIS_PARSE, parseGroupAnswer } from "../parseResponse.js";

describe("parseGroupAnswer", () => {
  it("reads the two-line answer format", () => {
    expect(parseGroupAnswer("Group Name: Union Square Hospitality Group\nTotal Locations: 25")).toEqual({
      group: "Union Square Hospitality Group",
      locations: "25"
    });
  });

  it("falls back to Independent when the text says so without structure", () => {
    expect(parseGroupAnswer("This restaurant appears to be independent.")).toEqual({
      group: "Independent",
      locations: "1"
    });
  });

  it("strips emphasis markup and surrounding whitespace", () => {
    const text = "Here is what I found:\n  Group Name: **Major Food Group**\n  Total Locations: *30*\n";
    expect(parseGroupAnswer(text)).toEqual({ group: "Major Food Group", locations: "30" });
  });

  it("handles CRLF line endings", () => {
    expect(parseGroupAnswer("Group Name: Altamarea Group\r\nTotal Locations: 12\r\n")).toEqual({
      group: "Altamarea Group",
      locations: "12"
    });
  });

  it("keeps a contradictory pair as returned", () => {
    expect(parseGroupAnswer("Group Name: Independent\nTotal Locations: 3")).toEqual({
      group: "Independent",
      locations: "3"
    });
  });

  it("uses the variant's missing value when only the group line is present", () => {
    expect(parseGroupAnswer("Group Name: Hillstone Restaurant Group", PRIMARY_PARSE)).toEqual({
      group: "Hillstone Restaurant Group",
      locations: ""
    });
    expect(parseGroupAnswer("Group Name: Hillstone Restaurant Group", SYNTHESIS_PARSE)).toEqual({
      group: "Hillstone Restaurant Group",
      locations: "Unknown"
    });
  });

  it("ignores an empty group line", () => {
    expect(parseGroupAnswer("Group Name: **\nTotal Locations: 4")).toEqual({ group: "Unknown", locations: "4" });
  });

  it("returns the defaults for short unstructured text", () => {
    expect(parseGroupAnswer("No information found.")).toEqual({ group: "Unknown", locations: "" });
    expect(parseGroupAnswer("")).toEqual({ group: "Unknown", locations: "" });
    expect(parseGroupAnswer("No information found.", SYNTHESIS_PARSE)).toEqual({ group: "Independent", locations: "1" });
  });

  it("takes the first sentence of a long unstructured primary answer", () => {
    const text =
      "Carbone is run by Major Food Group, the company behind a long list of restaurants in New York and Miami. " +
      "It was founded in 2011.";
    expect(text.length).toBeGreaterThan(100);

    expect(parseGroupAnswer(text, PRIMARY_PARSE)).toEqual({
      group: "Carbone is run by Major Food Group, the company behind a long list of restaurants in New York and Miami",
      locations: ""
    });
  });

  it("does not use the first-sentence fallback for synthesis answers", () => {
    const text =
      "Carbone is run by Major Food Group, the company behind a long list of restaurants in New York and Miami. " +
      "It was founded in 2011.";
    expect(parseGroupAnswer(text, SYNTHESIS_PARSE)).toEqual({ group: "Independent", locations: "1" });
  });

  it("prefers the independent keyword over the first-sentence fallback", () => {
    const text =
      "After reviewing several sources, this looks like an independent neighborhood restaurant with a single dining room.";
    expect(text.length).toBeGreaterThan(100);
    expect(parseGroupAnswer(text, PRIMARY_PARSE)).toEqual({ group: "Independent", locations: "1" });
  });
});
