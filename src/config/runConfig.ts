import { type ProviderKind, apiKeyFor, env } from "./env.js";
import type { RestaurantColumns } from "../adapters/RestaurantCsvAdapter.js";

export type RunConfig = {
  primaryProvider: ProviderKind;
  primaryApiKey: string;
  primaryModel: string;
  synthesisProvider: ProviderKind;
  synthesisApiKey: string;
  synthesisModel: string;
  // Serper key; empty disables the verification search.
  secondaryApiKey: string;

  inputPath: string;
  outputPath: string;
  logFile: string;
  columns: RestaurantColumns;

  interRowDelayMs: number;
  interVerificationDelayMs: number;
  requestTimeoutMs: number;

  // When false, "Independent" answers are never re-checked and any non-empty group counts as done.
  verify: boolean;
  limit?: number;
  dryRun: boolean;
};

function argValue(argv: string[], name: string): string | undefined {
  const idx = argv.indexOf(name);
  if (idx === -1) return undefined;
  return argv[idx + 1];
}

function nonNegativeInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const n = parseInt(raw, 10);
  if (!Number.isFinite(n) || n < 0) throw new Error(`${flag} expects a non-negative integer, got "${raw}"`);
  return n;
}

/**
 * Merges environment settings with command line flags:
 * `--input <csv> --output <csv> --limit <n> --delay <ms> --no-verify --dry-run`.
 */
export function loadRunConfig(argv: string[] = process.argv.slice(2)): RunConfig {
  const delay = nonNegativeInt(argValue(argv, "--delay"), "--delay");
  const limit = nonNegativeInt(argValue(argv, "--limit"), "--limit");

  return {
    primaryProvider: env.LLM_PROVIDER,
    primaryApiKey: apiKeyFor(env.LLM_PROVIDER),
    primaryModel: env.PRIMARY_MODEL,
    synthesisProvider: env.SYNTHESIS_PROVIDER,
    synthesisApiKey: apiKeyFor(env.SYNTHESIS_PROVIDER),
    synthesisModel: env.SYNTHESIS_MODEL,
    secondaryApiKey: env.SERPER_API_KEY,

    inputPath: argValue(argv, "--input") || env.INPUT_CSV,
    outputPath: argValue(argv, "--output") || env.OUTPUT_CSV,
    logFile: env.LOG_FILE,
    columns: {
      name: env.NAME_COLUMN,
      market: env.MARKET_COLUMN,
      domain: env.DOMAIN_COLUMN,
      group: "Hospitality Group",
      locations: "Total Locations",
      verified: "Verified"
    },

    interRowDelayMs: delay ?? env.REQUEST_DELAY_MS,
    interVerificationDelayMs: env.VERIFY_DELAY_MS,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MS,

    verify: !argv.includes("--no-verify"),
    limit,
    dryRun: argv.includes("--dry-run")
  };
}
