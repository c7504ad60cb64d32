#!/usr/bin/env node
import { apiKeyEnvName } from "../config/env.js";
import { loadRunConfig } from "../config/runConfig.js";
import { BatchRunner, createDefaultDeps } from "./batchRunner.js";
import { CsvTableStore } from "../store/CsvTableStore.js";

async function main() {
  const config = loadRunConfig();

  // Configuration errors stop the run before any row is touched or any file is written.
  if (!config.primaryApiKey) {
    const name = apiKeyEnvName(config.primaryProvider);
    console.error(`ERROR: ${name} environment variable not set!`);
    console.error("\nSet it in your shell or in a .env file:");
    console.error(`  export ${name}='your-api-key-here'`);
    process.exitCode = 1;
    return;
  }

  if (!new CsvTableStore(config.inputPath, config.outputPath).sourcePath()) {
    console.error(`ERROR: Input file '${config.inputPath}' not found!`);
    process.exitCode = 1;
    return;
  }

  const deps = createDefaultDeps(config);
  const { log } = deps;

  log.info("=".repeat(60));
  log.info("Restaurant Hospitality Group Finder");
  log.info("=".repeat(60));
  log.info(`Input file: ${config.inputPath}`);
  log.info(`Output file: ${config.dryRun ? "(dry run, nothing written)" : config.outputPath}`);
  log.info(`Primary backend: ${config.primaryProvider}`);
  log.info(`Request delay: ${config.interRowDelayMs / 1000} seconds`);
  if (!config.verify) {
    log.info("Verification: disabled (--no-verify)");
  } else if (!config.secondaryApiKey) {
    log.warn("WARNING: SERPER_API_KEY not set, \"Independent\" results will not be verified");
  } else {
    log.info(`Verification: Serper + ${config.synthesisApiKey ? config.synthesisProvider : "keyword heuristic"}`);
  }
  if (config.limit !== undefined) log.info(`Limit: ${config.limit} rows`);
  log.info("=".repeat(60));

  await new BatchRunner(config, deps).run();

  log.info(config.dryRun ? "✓ Dry run complete" : `✓ Complete! Results saved to ${config.outputPath}`);
}

main().catch(e => {
  console.error(e);
  process.exit(1);
});
