import { OUTCOME_STATUS } from "../constants.js";
import {
  AssertionFailure,
  ComparisonMismatch,
  InsufficientMessages,
  RpcApplicationError,
  RunnerError,
  TransientNetworkError,
  errorMessage,
} from "../errors.js";
import type { CallExecutor, DefinitionSource, LivenessProbe, ProtoPreflight, ReportSink } from "../ports.js";
import type {
  BatchResult,
  ExecutionOutcome,
  FailureDetail,
  JsonValue,
  OutcomeStatus,
  TestDefinition,
} from "../types.js";
import { WorkerPool } from "../../infrastructure/workerPool.js";
import { silentLogger, type Logger } from "../../infrastructure/logger.js";
import { compareDetailed } from "./compareResponse.js";
import { evaluateAssertions, type PredicateEvaluator } from "./evaluateAssertions.js";
import { attemptBudget, describeOutcome, executeWithRetry, type RetryPolicy, type RetryReport } from "./retry.js";
import { validateExpectedError } from "./validateError.js";
import type { VerbRegistry } from "./verbs.js";

export interface RunnerDeps {
  parser: DefinitionSource;
  executor: CallExecutor;
  evaluator: PredicateEvaluator;
  registry: VerbRegistry;
  probe: LivenessProbe;
  retryPolicy: RetryPolicy;
  preflight?: ProtoPreflight;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

export interface RunnerSettings {
  defaultAddress: string;
  timeoutMs: number;
  dryRun: boolean;
  concurrency: number;
}

interface Verdict {
  status: OutcomeStatus;
  detail: string;
  failure?: FailureDetail;
}

/** Keeps failed outcomes keyed by submission index so completion order does not matter. */
export class FailureCollector {
  private readonly entries = new Map<number, ExecutionOutcome>();

  add(index: number, outcome: ExecutionOutcome): void {
    this.entries.set(index, outcome);
  }

  get size(): number {
    return this.entries.size;
  }

  list(): ExecutionOutcome[] {
    return [...this.entries.entries()].sort(([a], [b]) => a - b).map(([, o]) => o);
  }
}

const passed = (detail: string): Verdict => ({ status: OUTCOME_STATUS.PASSED, detail });
const failed = (detail: string, failure: FailureDetail): Verdict => ({ status: OUTCOME_STATUS.FAILED, detail, failure });

/** What RESPONSE is compared against: the single message, or all of them. */
export function actualResponse(messages: JsonValue[]): JsonValue {
  return messages.length === 1 ? messages[0] : messages;
}

/**
 * Runs definition files: parse, probe, preflight, call with retry, validate.
 * `runOne` never throws; every problem becomes an outcome.
 */
export class TestRunner {
  private readonly deps: RunnerDeps;
  private readonly settings: RunnerSettings;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: RunnerDeps, settings: RunnerSettings) {
    this.deps = deps;
    this.settings = settings;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;
  }

  async runOne(path: string): Promise<ExecutionOutcome> {
    const started = this.now();
    let verdict: Verdict;
    try {
      verdict = await this.execute(path);
    } catch (e) {
      verdict = this.classifyError(e);
    }
    const outcome: ExecutionOutcome = {
      testId: path,
      status: verdict.status,
      durationMs: this.now() - started,
      detail: verdict.detail,
      ...(verdict.failure ? { failure: verdict.failure } : {}),
    };
    this.logger.debug(`${outcome.status} ${path} (${outcome.durationMs}ms)`);
    return Object.freeze(outcome);
  }

  async runMany(paths: readonly string[], concurrency = this.settings.concurrency, sink?: ReportSink): Promise<BatchResult> {
    const started = this.now();
    const pool = new WorkerPool(concurrency);
    const collector = new FailureCollector();

    const outcomes = await pool.map(paths, async (path, index) => {
      const outcome = await this.runOne(path);
      if (outcome.status !== OUTCOME_STATUS.PASSED) collector.add(index, outcome);
      if (sink) this.notify(() => sink.onOutcome(outcome));
      return outcome;
    });

    const result: BatchResult = { outcomes, failures: collector.list(), durationMs: this.now() - started };
    if (sink) this.notify(() => sink.onBatchComplete(result));
    return result;
  }

  private notify(fn: () => void): void {
    try {
      fn();
    } catch (e) {
      this.logger.err(`report sink failed: ${errorMessage(e)}`);
    }
  }

  private classifyError(e: unknown): Verdict {
    if (e instanceof TransientNetworkError) {
      return failed(e.message, { kind: "infrastructure", reason: e.message, attempts: e.attempts });
    }
    if (e instanceof RpcApplicationError) {
      return failed(e.message, { kind: "unexpected_error", exitCode: e.exitCode, output: e.output });
    }
    if (e instanceof ComparisonMismatch) {
      return failed(e.message, { kind: "comparison", expected: e.expected, actual: e.actual, mismatches: e.mismatches });
    }
    if (e instanceof InsufficientMessages) {
      const missingMessages = { expected: e.expected, received: e.received };
      return failed(e.message, { kind: "assertions", groups: e.groups, missingMessages });
    }
    if (e instanceof AssertionFailure) {
      return failed(e.message, { kind: "assertions", groups: e.groups });
    }
    if (e instanceof RunnerError && (e.kind === "validation" || e.kind === "io")) {
      return { status: OUTCOME_STATUS.ERROR, detail: e.message, failure: { kind: "definition", reason: e.message } };
    }
    const reason = e instanceof RunnerError ? e.message : `unexpected error: ${errorMessage(e)}`;
    return { status: OUTCOME_STATUS.ERROR, detail: reason, failure: { kind: "infrastructure", reason } };
  }

  private async execute(path: string): Promise<Verdict> {
    const { parser, executor, probe, preflight, retryPolicy } = this.deps;
    const definition = await parser.parse(path);
    const address = definition.address ?? this.settings.defaultAddress;
    const { dryRun } = this.settings;

    if (!dryRun && attemptBudget(definition, retryPolicy) > 1) {
      const health = await probe.check(address);
      if (!health.reachable) {
        const reason = `service unreachable at ${address}${health.error ? `: ${health.error}` : ""}`;
        return failed(reason, { kind: "infrastructure", reason });
      }
    }

    if (preflight) await preflight.check(definition);

    const captureMetadata = this.deps.registry.requiresMetadata(definition.assertions.flat());
    const timeoutMs = definition.options.timeoutMs ?? this.settings.timeoutMs;
    const report = await executeWithRetry(
      definition,
      retryPolicy,
      () => executor.execute(definition, { address, dryRun, captureMetadata, timeoutMs }),
      {
        sleep: this.deps.sleep,
        onRetry: ({ attempt, delayMs, reason }) =>
          this.logger.warn(`${path}: attempt ${attempt} failed (${reason}), retrying in ${delayMs}ms`),
      }
    );
    return this.validate(definition, report);
  }

  /** Returns the verdict for expected outcomes; mismatches are thrown as RunnerErrors. */
  private async validate(definition: TestDefinition, report: RetryReport): Promise<Verdict> {
    const { result, attempts, exhausted } = report;
    const { outcome } = result;

    // an ERROR expectation still judges the last attempt
    if (exhausted && !definition.expectedError) {
      const suffix = `gave up after ${attempts} attempt${attempts === 1 ? "" : "s"}`;
      throw new TransientNetworkError(`${describeOutcome(outcome)} (${suffix})`, attempts);
    }

    if (definition.expectedError) {
      if (outcome.kind === "success") {
        return failed("expected error but request succeeded", { kind: "unexpected_success", actual: result.messages });
      }
      const actual = outcome.kind === "rpc_error" ? outcome.error : { message: outcome.message };
      const check = validateExpectedError(definition.expectedError, actual);
      if (check.matched) return passed("expected error matched");
      return failed(`error did not match: ${check.reasons.join("; ")}`, {
        kind: "error_mismatch",
        expected: definition.expectedError,
        actual: JSON.stringify(actual),
        reasons: check.reasons,
      });
    }

    if (outcome.kind === "rpc_error") {
      throw new RpcApplicationError(outcome.error, result.exitCode, result.rawOutput || outcome.error.message);
    }
    if (outcome.kind === "transport_error") {
      return failed(`call failed: ${outcome.message}`, {
        kind: "unexpected_error",
        exitCode: result.exitCode,
        output: result.rawOutput || outcome.message,
      });
    }

    const { expectedResponse } = definition;
    if (expectedResponse !== undefined && (definition.assertions.length === 0 || definition.responseOptions.withAsserts)) {
      const comparison = compareDetailed(expectedResponse, actualResponse(result.messages), definition.responseOptions);
      if (!comparison.equal) throw new ComparisonMismatch(comparison.expected, comparison.actual, comparison.mismatches);
    }

    if (definition.assertions.length > 0) {
      const assertions = await evaluateAssertions(definition.assertions, result, this.deps);
      if (assertions.missingMessages) {
        const { expected, received } = assertions.missingMessages;
        throw new InsufficientMessages(expected, received, assertions.groups);
      }
      if (!assertions.passed) throw new AssertionFailure(assertions.groups);
      return passed(`${assertions.groups.length} assertion group(s) passed`);
    }

    if (expectedResponse !== undefined) return passed("response matched");
    return passed("call succeeded");
  }
}
