#!/usr/bin/env node
import { buildTestRunner, buildVerbRegistry } from "./bootstrap.js";
import { errorMessage } from "./domain/errors.js";
import { loadRunnerConfig } from "./infrastructure/config.js";
import { collectDefinitionFiles } from "./infrastructure/definitionFiles.js";
import { createLogger } from "./infrastructure/logger.js";
import { createConsoleReportSink } from "./interfaces/failureReport.js";

async function main(): Promise<void> {
  const config = loadRunnerConfig();
  const logger = createLogger(config.logLevel);

  const inputs = process.argv.slice(2);
  const files = await collectDefinitionFiles(inputs.length > 0 ? inputs : ["."]);
  if (files.length === 0) {
    logger.err("no .gctf files found");
    process.exitCode = 1;
    return;
  }

  const registry = await buildVerbRegistry(config, logger);
  const runner = buildTestRunner(config, registry, logger);

  if (config.dryRun.enabled) logger.log("dry run: commands are printed, not executed");
  logger.log(`running ${files.length} test(s) with ${config.concurrency} worker(s)`);

  const batch = await runner.runMany(files, config.concurrency, createConsoleReportSink(logger));
  process.exitCode = batch.failures.length === 0 ? 0 : 1;
}

main().catch((e: unknown) => {
  console.error("[gctf]", errorMessage(e));
  process.exitCode = 1;
});
