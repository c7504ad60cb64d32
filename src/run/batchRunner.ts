import type { RunConfig } from "../config/runConfig.js";
import type { DatasetAdapter, RawRow } from "../adapters/DatasetAdapter.js";
import { RestaurantCsvAdapter } from "../adapters/RestaurantCsvAdapter.js";
import {
  type Annotation,
  type RestaurantIdentity,
  INDEPENDENT,
  VERIFIED,
  isErrorGroup,
  isResolved
} from "../domain/records.js";
import { createChatProvider } from "../llm/createProvider.js";
import { type Logger, createLogger } from "../log/logger.js";
import { PrimaryResolver } from "../resolve/primaryResolver.js";
import { SecondaryVerifier } from "../resolve/secondaryVerifier.js";
import { SerperProvider } from "../serp/SerperProvider.js";
import { CsvTableStore } from "../store/CsvTableStore.js";
import { MemoryTableStore } from "../store/MemoryTableStore.js";
import { type TableStore, ensureColumns } from "../store/TableStore.js";
import { type RunSummary, formatSummary, summarize } from "./summary.js";

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export type RunnerDeps = {
  store: TableStore;
  adapter: DatasetAdapter;
  resolver: Pick<PrimaryResolver, "resolve">;
  verifier: Pick<SecondaryVerifier, "available" | "verify">;
  log: Logger;
  sleep: (ms: number) => Promise<void>;
};

export function createDefaultDeps(config: RunConfig): RunnerDeps {
  const log = createLogger({ file: config.logFile });

  const primary = config.primaryApiKey
    ? createChatProvider(config.primaryProvider, config.primaryApiKey, config.primaryModel, config.requestTimeoutMs)
    : undefined;
  const synthesis = config.synthesisApiKey
    ? createChatProvider(config.synthesisProvider, config.synthesisApiKey, config.synthesisModel, config.requestTimeoutMs)
    : undefined;
  const serp =
    config.verify && config.secondaryApiKey
      ? new SerperProvider(config.secondaryApiKey, Math.min(config.requestTimeoutMs, 30000))
      : undefined;

  const csvStore = new CsvTableStore(config.inputPath, config.outputPath);
  const store = config.dryRun ? new MemoryTableStore(() => csvStore.load()) : csvStore;

  return {
    store,
    adapter: new RestaurantCsvAdapter(config.columns),
    resolver: new PrimaryResolver(primary, log),
    verifier: new SecondaryVerifier(serp, synthesis, log),
    log,
    sleep
  };
}

function hasAllDeps(d: Partial<RunnerDeps>): d is RunnerDeps {
  return !!(d.store && d.adapter && d.resolver && d.verifier && d.log && d.sleep);
}

/**
 * Walks the table in order, one restaurant at a time. The whole table is saved
 * after every processed row, so a rerun after an interruption skips everything
 * already resolved and continues with the first unresolved row. The inter-row
 * delay only runs when another row is still to be processed.
 */
export class BatchRunner {
  private readonly deps: RunnerDeps;

  constructor(
    private readonly config: RunConfig,
    deps: Partial<RunnerDeps> = {}
  ) {
    this.deps = hasAllDeps(deps) ? deps : { ...createDefaultDeps(config), ...deps };
  }

  async run(): Promise<RunSummary> {
    const { store, adapter, log } = this.deps;

    const table = await store.load();
    ensureColumns(table, adapter.annotationColumns());

    const total = table.rows.length;
    log.info(`Found ${total} restaurants to process`);

    let processed = 0;

    for (let idx = 0; idx < total; idx++) {
      const row = table.rows[idx];
      const label = `[${idx + 1}/${total}]`;
      if (!row) continue;

      const restaurant = adapter.parseRow(row);
      if (!restaurant) {
        log.warn(`${label} Skipping row without a restaurant name`);
        continue;
      }

      if (isResolved(adapter.readAnnotation(row), this.config.verify)) {
        log.info(`${label} Skipping ${restaurant.name} (already processed)`);
        continue;
      }

      if (this.config.limit !== undefined && processed >= this.config.limit) {
        log.info(`Limit of ${this.config.limit} rows reached, stopping`);
        break;
      }

      log.info(`${label} Searching for: ${restaurant.name}...`);
      const annotation = await this.annotate(restaurant);
      adapter.writeAnnotation(row, annotation);

      const tag = annotation.verified ? ` [${annotation.verified}]` : "";
      log.info(`  → Result: ${annotation.group} (${annotation.locations || "?"} locations)${tag}`);

      await store.save(table);
      processed++;

      if (this.hasWorkAfter(table.rows, idx, processed)) await this.deps.sleep(this.config.interRowDelayMs);
    }

    const summary = summarize(table.rows.map(r => adapter.readAnnotation(r)));
    log.info("=== Summary ===");
    for (const line of formatSummary(summary)) log.info(line);
    return summary;
  }

  // True when a later row will be sent to the backends in this run.
  private hasWorkAfter(rows: RawRow[], idx: number, processed: number): boolean {
    const { limit, verify } = this.config;
    if (limit !== undefined && processed >= limit) return false;
    const { adapter } = this.deps;
    return rows.slice(idx + 1).some(r => !!adapter.parseRow(r) && !isResolved(adapter.readAnnotation(r), verify));
  }

  private async annotate(restaurant: RestaurantIdentity): Promise<Annotation> {
    const { resolver, verifier, log } = this.deps;

    const primary = await resolver.resolve(restaurant);
    if (isErrorGroup(primary.group)) return { ...primary, verified: "" };
    if (primary.group !== INDEPENDENT) return { ...primary, verified: VERIFIED.GROUP_IDENTIFIED };

    if (!this.config.verify || !verifier.available) {
      return { ...primary, verified: VERIFIED.SEARCH_UNAVAILABLE };
    }

    log.info(`  Primary says Independent, verifying with Serper...`);
    await this.deps.sleep(this.config.interVerificationDelayMs);

    const v = await verifier.verify(restaurant);
    if (v.group === INDEPENDENT) {
      return { group: INDEPENDENT, locations: "1", verified: VERIFIED.CONFIRMED_INDEPENDENT };
    }
    log.info(`  Verification (${v.source}) found group: ${v.group}`);
    return { group: v.group, locations: v.locations, verified: VERIFIED.GROUP_FOUND };
  }
}
