import dotenv from "dotenv";
dotenv.config();

export type ProviderKind = "perplexity" | "anthropic";

function provider(name: string, fallback: ProviderKind): ProviderKind {
  const v = (process.env[name] || fallback).toLowerCase();
  if (v !== "perplexity" && v !== "anthropic") {
    throw new Error(`Unsupported ${name}: ${v} (expected "perplexity" or "anthropic")`);
  }
  return v;
}

const LLM_PROVIDER = provider("LLM_PROVIDER", "perplexity");

export const env = {
  LLM_PROVIDER,
  // Synthesis pass of the verifier; defaults to the primary backend.
  SYNTHESIS_PROVIDER: provider("SYNTHESIS_PROVIDER", LLM_PROVIDER),

  PERPLEXITY_API_KEY: process.env.PERPLEXITY_API_KEY || "",
  ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY || "",
  // Optional: without it "Independent" answers are tagged as unverified.
  SERPER_API_KEY: process.env.SERPER_API_KEY || "",

  PRIMARY_MODEL: process.env.PRIMARY_MODEL || "",
  SYNTHESIS_MODEL: process.env.SYNTHESIS_MODEL || "",

  INPUT_CSV: process.env.INPUT_CSV || "signed_restaurants.csv",
  OUTPUT_CSV: process.env.OUTPUT_CSV || "restaurants_with_hospitality_groups.csv",
  LOG_FILE: process.env.LOG_FILE || "data/enrich.log",

  NAME_COLUMN: process.env.NAME_COLUMN || "Company name",
  MARKET_COLUMN: process.env.MARKET_COLUMN || "Macro Geo (NYC, SF, CHS, DC, LA, NASH, DEN)",
  DOMAIN_COLUMN: process.env.DOMAIN_COLUMN || "Company Domain Name",

  REQUEST_DELAY_MS: parseInt(process.env.REQUEST_DELAY_MS || "2000", 10),
  VERIFY_DELAY_MS: parseInt(process.env.VERIFY_DELAY_MS || "1000", 10),
  REQUEST_TIMEOUT_MS: parseInt(process.env.REQUEST_TIMEOUT_MS || "60000", 10)
};

export function apiKeyFor(kind: ProviderKind): string {
  return kind === "anthropic" ? env.ANTHROPIC_API_KEY : env.PERPLEXITY_API_KEY;
}

export function apiKeyEnvName(kind: ProviderKind): string {
  return kind === "anthropic" ? "ANTHROPIC_API_KEY" : "PERPLEXITY_API_KEY";
}
