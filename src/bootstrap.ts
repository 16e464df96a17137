import { createRetryPolicy } from "./domain/usecases/retry.js";
import { TestRunner } from "./domain/usecases/runTests.js";
import { createDefaultVerbRegistry, type VerbRegistry } from "./domain/usecases/verbs.js";
import type { RunnerConfig } from "./infrastructure/config.js";
import { DefinitionParser } from "./infrastructure/definitionParser.js";
import { GrpcurlClient } from "./infrastructure/grpcurlClient.js";
import { JqEvaluator } from "./infrastructure/jqEvaluator.js";
import { createTcpProbe } from "./infrastructure/livenessProbe.js";
import type { Logger } from "./infrastructure/logger.js";
import { loadVerbPlugins } from "./infrastructure/pluginLoader.js";
import { createProcessRunner, type ProcessRunner } from "./infrastructure/processRunner.js";
import { ProtobufPreflight } from "./infrastructure/protoLoader.js";

/** Built-in verbs plus whatever the configured plugin directory provides. */
export async function buildVerbRegistry(config: RunnerConfig, logger: Logger): Promise<VerbRegistry> {
  const registry = createDefaultVerbRegistry();
  if (config.pluginDir) {
    const loaded = await loadVerbPlugins(config.pluginDir, registry, logger);
    if (loaded.length > 0) logger.log(`loaded verb plugins: ${loaded.map((n) => `@${n}`).join(", ")}`);
  }
  return registry;
}

export function buildTestRunner(
  config: RunnerConfig,
  registry: VerbRegistry,
  logger: Logger,
  runner: ProcessRunner = createProcessRunner()
): TestRunner {
  return new TestRunner(
    {
      parser: new DefinitionParser({ registry, logger }),
      executor: new GrpcurlClient({
        runner,
        bin: config.grpcurlBin,
        logger,
        dryRun: { response: config.dryRun.response, expectError: config.dryRun.expectError },
      }),
      evaluator: new JqEvaluator({ runner, bin: config.jqBin }),
      registry,
      probe: createTcpProbe(),
      preflight: config.protoPreflight ? new ProtobufPreflight() : undefined,
      retryPolicy: createRetryPolicy(config.retry),
      logger,
    },
    {
      defaultAddress: config.defaultAddress,
      timeoutMs: Math.round(config.timeoutSeconds * 1000),
      dryRun: config.dryRun.enabled,
      concurrency: config.concurrency,
    }
  );
}
