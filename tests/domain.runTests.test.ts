import { describe, it, expect, vi } from "vitest";
import { FailureCollector, TestRunner, actualResponse, type RunnerDeps } from "../src/domain/usecases/runTests.js";
import { createRetryPolicy } from "../src/domain/usecases/retry.js";
import { createDefaultVerbRegistry } from "../src/domain/usecases/verbs.js";
import { ValidationError } from "../src/domain/errors.js";
import type { CallOutcome, CallResult, ExecutionOutcome, JsonValue, TestDefinition } from "../src/domain/types.js";
import type { ExecuteOptions } from "../src/domain/ports.js";
import type { Logger } from "../src/infrastructure/logger.js";

function definition(over: Partial<TestDefinition> = {}): TestDefinition {
  return {
    path: "case.gctf",
    endpoint: "demo.Service/Call",
    requests: [{}],
    assertions: [],
    headers: {},
    tls: { mode: "plaintext", insecureSkipVerify: false },
    proto: { mode: "reflection", files: [], importPaths: [] },
    responseOptions: { mode: "exact", tolerances: [], redactPaths: [], unorderedArrays: [], withAsserts: false },
    options: {},
    ...over,
  };
}

function callResult(outcome: CallOutcome, messages: JsonValue[] = []): CallResult {
  return {
    outcome,
    exitCode: outcome.kind === "success" ? 0 : outcome.kind === "rpc_error" ? 64 + outcome.error.code : 1,
    messages,
    headers: {},
    trailers: {},
    rawOutput: messages.map((m) => JSON.stringify(m)).join("\n"),
    command: ["grpcurl"],
    durationMs: 3,
    dryRun: false,
  };
}

const success = (...messages: JsonValue[]) => callResult({ kind: "success" }, messages);

// Understands `.key >= N`; every other predicate holds.
const evaluator = {
  evaluate: async (json: JsonValue, predicate: string) => {
    const m = /^\.(\w+) >= (\d+)$/.exec(predicate);
    if (!m) return true;
    const value = typeof json === "object" && json !== null && !Array.isArray(json) ? json[m[1]] : undefined;
    return typeof value === "number" && value >= Number(m[2]);
  },
};

const spyLogger = (): Logger => ({ log: vi.fn(), err: vi.fn(), warn: vi.fn(), debug: vi.fn() });

function setup(
  definitions: Record<string, TestDefinition>,
  respond: (def: TestDefinition, opts: ExecuteOptions) => Promise<CallResult>,
  over: Partial<RunnerDeps> = {},
  dryRun = false
) {
  const parser = {
    parse: vi.fn(async (path: string) => {
      const def = definitions[path];
      if (!def) throw new ValidationError("missing ENDPOINT section", path);
      return def;
    }),
  };
  const executor = { execute: vi.fn(respond) };
  const liveness = { check: vi.fn(async (_address: string) => ({ reachable: true })) };
  const runner = new TestRunner(
    {
      parser,
      executor,
      evaluator,
      registry: createDefaultVerbRegistry(),
      probe: liveness,
      retryPolicy: createRetryPolicy({ maxAttempts: 3, initialDelayMs: 0 }),
      sleep: async () => undefined,
      ...over,
    },
    { defaultAddress: "localhost:50051", timeoutMs: 30_000, dryRun, concurrency: 2 }
  );
  return { runner, parser, executor, liveness };
}

const runSingle = (def: TestDefinition, result: CallResult, over: Partial<RunnerDeps> = {}) =>
  setup({ [def.path]: def }, async () => result, over).runner.runOne(def.path);

describe("TestRunner.runOne", () => {
  it("matches a wildcard field", async () => {
    const outcome = await runSingle(definition({ expectedResponse: { id: "*", name: "Jane" } }), success({ id: "7", name: "Jane" }));
    expect(outcome.status).toBe("PASSED");
    expect(outcome.detail).toBe("response matched");
    expect(outcome.testId).toBe("case.gctf");
  });

  it("passes when the expected error occurs", async () => {
    const outcome = await runSingle(
      definition({ expectedError: { code: 5, message: "not found" } }),
      callResult({ kind: "rpc_error", error: { code: 5, message: "user 9 not found" } })
    );
    expect(outcome.status).toBe("PASSED");
    expect(outcome.detail).toBe("expected error matched");
  });

  it("fails when an expected error does not occur", async () => {
    const outcome = await runSingle(definition({ expectedError: { code: 5, message: "not found" } }), success({ id: 1 }));
    expect(outcome.status).toBe("FAILED");
    expect(outcome.detail).toBe("expected error but request succeeded");
    expect(outcome.failure).toEqual({ kind: "unexpected_success", actual: [{ id: 1 }] });
  });

  it("reports the mismatching parts of an error", async () => {
    const outcome = await runSingle(
      definition({ expectedError: { code: 5 } }),
      callResult({ kind: "rpc_error", error: { code: 7, message: "denied" } })
    );
    expect(outcome.status).toBe("FAILED");
    expect(outcome.detail).toBe("error did not match: code: expected 5 (NOT_FOUND), got 7 (PERMISSION_DENIED)");
  });

  it("pairs assertion groups with streamed messages", async () => {
    const outcome = await runSingle(
      definition({ assertions: [[".progress >= 0"], [".progress >= 50"], [".progress >= 0"]] }),
      success({ progress: 10 }, { progress: 40 }, { progress: 90 })
    );
    expect(outcome.status).toBe("FAILED");
    expect(outcome.detail).toBe("1 of 3 assertion group(s) failed");
    expect(outcome.failure).toMatchObject({ kind: "assertions", groups: [{ passed: true }, { passed: false }, { passed: true }] });
  });

  it("fails when the stream is shorter than the assertion groups", async () => {
    const outcome = await runSingle(definition({ assertions: [["true"], ["true"]] }), success({ n: 1 }));
    expect(outcome.detail).toBe("expected at least 2 streamed messages, received 1");
  });

  it("applies an absolute tolerance inclusively", async () => {
    const def = definition({
      expectedResponse: { price: 9.99 },
      responseOptions: {
        mode: "exact",
        tolerances: [{ path: ".price", kind: "absolute", value: 0.01 }],
        redactPaths: [],
        unorderedArrays: [],
        withAsserts: false,
      },
    });
    expect((await runSingle(def, success({ price: 10.0 }))).status).toBe("PASSED");
    const outside = await runSingle(def, success({ price: 10.0001 }));
    expect(outside.status).toBe("FAILED");
    expect(outside.detail).toBe("response mismatch (1 difference)");
  });

  it("runs both RESPONSE and ASSERTS with with_asserts", async () => {
    const def = definition({
      expectedResponse: { progress: 100 },
      assertions: [[".progress >= 50"]],
      responseOptions: { mode: "exact", tolerances: [], redactPaths: [], unorderedArrays: [], withAsserts: true },
    });
    const outcome = await runSingle(def, success({ progress: 60 }));
    expect(outcome.status).toBe("FAILED");
    expect(outcome.failure?.kind).toBe("comparison");
  });

  it("reports an unexpected rpc failure", async () => {
    const outcome = await runSingle(definition(), callResult({ kind: "rpc_error", error: { code: 5, message: "gone" } }));
    expect(outcome.status).toBe("FAILED");
    expect(outcome.detail).toBe("call failed: NOT_FOUND: gone");
    expect(outcome.failure).toMatchObject({ kind: "unexpected_error", exitCode: 69 });
  });

  it("passes a plain successful call", async () => {
    const outcome = await runSingle(definition(), success());
    expect(outcome).toEqual({ testId: "case.gctf", status: "PASSED", durationMs: expect.any(Number), detail: "call succeeded" });
    expect(Object.isFrozen(outcome)).toBe(true);
  });

  it("gives up on transient failures after the attempt budget", async () => {
    const logger = spyLogger();
    const refused = callResult({ kind: "transport_error", message: "connection refused" });
    const { runner, executor, liveness } = setup({ "case.gctf": definition() }, async () => refused, { logger });

    const outcome = await runner.runOne("case.gctf");

    expect(executor.execute).toHaveBeenCalledTimes(3);
    expect(liveness.check).toHaveBeenCalledTimes(1);
    expect(outcome.status).toBe("FAILED");
    expect(outcome.detail).toBe("connection refused (gave up after 3 attempts)");
    expect(outcome.failure).toEqual({ kind: "infrastructure", reason: "connection refused (gave up after 3 attempts)", attempts: 3 });
    expect(logger.warn).toHaveBeenCalledWith("case.gctf: attempt 1 failed (connection refused), retrying in 0ms");
  });

  it("stops before calling an unreachable service", async () => {
    const { runner, executor } = setup({ "case.gctf": definition() }, async () => success(), {
      probe: { check: async () => ({ reachable: false, error: "refused" }) },
    });
    const outcome = await runner.runOne("case.gctf");
    expect(executor.execute).not.toHaveBeenCalled();
    expect(outcome.detail).toBe("service unreachable at localhost:50051: refused");
  });

  it("skips the liveness check for a dry run and a single attempt", async () => {
    const dry = setup({ "case.gctf": definition() }, async () => success(), {}, true);
    await dry.runner.runOne("case.gctf");
    expect(dry.liveness.check).not.toHaveBeenCalled();
    expect(dry.executor.execute.mock.calls[0][1].dryRun).toBe(true);

    const single = setup({ "case.gctf": definition({ options: { retries: 1 } }) }, async () => success());
    await single.runner.runOne("case.gctf");
    expect(single.liveness.check).not.toHaveBeenCalled();
  });

  it("makes one attempt and skips the liveness check when retries are disabled", async () => {
    const refused = callResult({ kind: "transport_error", message: "connection refused" });
    const { runner, executor, liveness } = setup({ "case.gctf": definition({ options: { retries: 3 } }) }, async () => refused, {
      retryPolicy: createRetryPolicy({ maxAttempts: 3, initialDelayMs: 0, disabled: true }),
    });

    const outcome = await runner.runOne("case.gctf");

    expect(liveness.check).not.toHaveBeenCalled();
    expect(executor.execute).toHaveBeenCalledTimes(1);
    expect(outcome.detail).toBe("connection refused (gave up after 1 attempt)");
    expect(outcome.failure).toEqual({ kind: "infrastructure", reason: "connection refused (gave up after 1 attempt)", attempts: 1 });
  });

  it("retries an unavailable status and then matches it against ERROR", async () => {
    const unavailable = callResult({ kind: "rpc_error", error: { code: 14, message: "service draining" } });
    const { runner, executor } = setup({ "case.gctf": definition({ expectedError: { code: 14 } }) }, async () => unavailable);

    const outcome = await runner.runOne("case.gctf");

    expect(executor.execute).toHaveBeenCalledTimes(3);
    expect(outcome.status).toBe("PASSED");
    expect(outcome.detail).toBe("expected error matched");
  });

  it("gives up on a deadline-exceeded status with no ERROR expectation", async () => {
    const deadline = callResult({ kind: "rpc_error", error: { code: 4, message: "too slow" } });
    const { runner, executor } = setup({ "case.gctf": definition() }, async () => deadline);

    const outcome = await runner.runOne("case.gctf");

    expect(executor.execute).toHaveBeenCalledTimes(3);
    expect(outcome.status).toBe("FAILED");
    expect(outcome.failure).toEqual({ kind: "infrastructure", reason: "DEADLINE_EXCEEDED: too slow (gave up after 3 attempts)", attempts: 3 });
  });

  it("passes the per-file address, timeout and metadata needs to the executor", async () => {
    const def = definition({
      address: "other.local:9000",
      options: { timeoutMs: 1500 },
      assertions: [['@header("x-env") == "ci"']],
    });
    const { runner, executor } = setup({ "case.gctf": def }, async () => success({}));
    await runner.runOne("case.gctf");
    expect(executor.execute.mock.calls[0][1]).toEqual({ address: "other.local:9000", dryRun: false, captureMetadata: true, timeoutMs: 1500 });
  });

  it("turns definition problems into ERROR outcomes", async () => {
    const { runner } = setup({}, async () => success());
    const outcome = await runner.runOne("broken.gctf");
    expect(outcome.status).toBe("ERROR");
    expect(outcome.failure).toEqual({ kind: "definition", reason: "broken.gctf: missing ENDPOINT section" });
  });

  it("turns a failing proto preflight into an ERROR outcome", async () => {
    const outcome = await runSingle(definition(), success(), {
      preflight: {
        check: async () => {
          throw new ValidationError("method Call not found on service demo.Service", "case.gctf");
        },
      },
    });
    expect(outcome.status).toBe("ERROR");
    expect(outcome.detail).toBe("case.gctf: method Call not found on service demo.Service");
  });

  it("turns unexpected exceptions into infrastructure errors", async () => {
    const { runner } = setup({ "case.gctf": definition() }, async () => {
      throw new Error("boom");
    });
    const outcome = await runner.runOne("case.gctf");
    expect(outcome.status).toBe("ERROR");
    expect(outcome.failure).toEqual({ kind: "infrastructure", reason: "unexpected error: boom" });
  });
});

describe("TestRunner.runMany", () => {
  it("keeps submission order and collects every failure", async () => {
    const defs = {
      "a.gctf": definition({ path: "a.gctf" }),
      "b.gctf": definition({ path: "b.gctf", expectedResponse: { ok: true } }),
      "c.gctf": definition({ path: "c.gctf" }),
    };
    const { runner } = setup(defs, async (def) => {
      // later files finish first
      await new Promise<void>((resolve) => setTimeout(resolve, def.path === "a.gctf" ? 20 : 1));
      return success({ ok: false });
    });
    const seen: string[] = [];
    const onBatchComplete = vi.fn();

    const batch = await runner.runMany(["a.gctf", "b.gctf", "missing.gctf", "c.gctf"], 2, {
      onOutcome: (o: ExecutionOutcome) => seen.push(o.testId),
      onBatchComplete,
    });

    expect(batch.outcomes.map((o) => `${o.testId}:${o.status}`)).toEqual([
      "a.gctf:PASSED",
      "b.gctf:FAILED",
      "missing.gctf:ERROR",
      "c.gctf:PASSED",
    ]);
    expect(batch.failures.map((o) => o.testId)).toEqual(["b.gctf", "missing.gctf"]);
    expect([...seen].sort()).toEqual(["a.gctf", "b.gctf", "c.gctf", "missing.gctf"]);
    expect(onBatchComplete).toHaveBeenCalledWith(batch);
  });

  it("logs a failing report sink without losing the batch", async () => {
    const logger = spyLogger();
    const { runner } = setup({ "a.gctf": definition({ path: "a.gctf" }) }, async () => success(), { logger });
    const batch = await runner.runMany(["a.gctf"], 1, {
      onOutcome: () => {
        throw new Error("sink down");
      },
      onBatchComplete: () => undefined,
    });
    expect(batch.outcomes).toHaveLength(1);
    expect(logger.err).toHaveBeenCalledWith("report sink failed: sink down");
  });
});

describe("FailureCollector", () => {
  it("lists failures by submission index", () => {
    const collector = new FailureCollector();
    const outcome = (testId: string): ExecutionOutcome => ({ testId, status: "FAILED", durationMs: 0, detail: "" });
    collector.add(4, outcome("late"));
    collector.add(1, outcome("early"));
    expect(collector.size).toBe(2);
    expect(collector.list().map((o) => o.testId)).toEqual(["early", "late"]);
  });
});

describe("actualResponse", () => {
  it("unwraps a single message", () => {
    expect(actualResponse([{ a: 1 }])).toEqual({ a: 1 });
    expect(actualResponse([{ a: 1 }, { a: 2 }])).toEqual([{ a: 1 }, { a: 2 }]);
    expect(actualResponse([])).toEqual([]);
  });
});
