export * from "./domain/types.js";
export * from "./domain/errors.js";
export * from "./domain/ports.js";
export { parseStatusCode, statusName } from "./domain/grpcStatus.js";
export { canonicalize, compare, compareDetailed, type ComparisonReport } from "./domain/usecases/compareResponse.js";
export { evaluateAssertions, evaluateGroup, type AssertionReport, type PredicateEvaluator } from "./domain/usecases/evaluateAssertions.js";
export { validateExpectedError } from "./domain/usecases/validateError.js";
export { createRetryPolicy, executeWithRetry, isTransientFailure, type RetryPolicy, type RetryReport } from "./domain/usecases/retry.js";
export { FailureCollector, TestRunner, type RunnerDeps, type RunnerSettings } from "./domain/usecases/runTests.js";
export { BUILTIN_VERBS, VerbRegistry, createDefaultVerbRegistry, type VerbContext, type VerbDefinition } from "./domain/usecases/verbs.js";
export { loadRunnerConfig, parseRunnerConfig, type RunnerConfig } from "./infrastructure/config.js";
export { DefinitionParser } from "./infrastructure/definitionParser.js";
export { collectDefinitionFiles } from "./infrastructure/definitionFiles.js";
export { GrpcurlClient, buildGrpcurlArgs, renderPreview, type DryRunSimulation } from "./infrastructure/grpcurlClient.js";
export { JqEvaluator } from "./infrastructure/jqEvaluator.js";
export { createTcpProbe } from "./infrastructure/livenessProbe.js";
export { createLogger, silentLogger, type Logger } from "./infrastructure/logger.js";
export { loadVerbPlugins } from "./infrastructure/pluginLoader.js";
export { createProcessRunner, type ProcessRunner, type ProcessResult } from "./infrastructure/processRunner.js";
export { ProtobufPreflight } from "./infrastructure/protoLoader.js";
export { WorkerPool } from "./infrastructure/workerPool.js";
export { createConsoleReportSink, renderFailureSummary } from "./interfaces/failureReport.js";
export { buildTestRunner, buildVerbRegistry } from "./bootstrap.js";
