import { TRANSIENT_NETWORK_PATTERNS } from "../constants.js";
import { TRANSIENT_STATUS_CODES, statusName } from "../grpcStatus.js";
import type { CallOutcome, CallResult, TestDefinition } from "../types.js";

export interface RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;
  // one attempt per test, whatever a file's `retries` says
  readonly retriesDisabled: boolean;
  readonly isRetryable: (outcome: CallOutcome) => boolean;
}

export interface RetryReport {
  result: CallResult;
  attempts: number;
  // the last attempt still failed with a retryable error
  exhausted: boolean;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; reason: string }) => void;
}

/**
 * Transport failures whose text matches the transient vocabulary, and RPC
 * errors with status UNAVAILABLE or DEADLINE_EXCEEDED.
 */
export function isTransientFailure(outcome: CallOutcome): boolean {
  switch (outcome.kind) {
    case "transport_error": {
      const text = outcome.message.toLowerCase();
      return TRANSIENT_NETWORK_PATTERNS.some((p) => text.includes(p));
    }
    case "rpc_error":
      return TRANSIENT_STATUS_CODES.includes(outcome.error.code);
    default:
      return false;
  }
}

/** Short description of a failed outcome for logs. */
export function describeOutcome(outcome: CallOutcome): string {
  switch (outcome.kind) {
    case "transport_error":
      return outcome.message;
    case "rpc_error":
      return `${statusName(outcome.error.code)}: ${outcome.error.message}`;
    default:
      return outcome.kind;
  }
}

export function createRetryPolicy(cfg: {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier?: number;
  maxDelayMs?: number;
  disabled?: boolean;
}): RetryPolicy {
  const retriesDisabled = cfg.disabled ?? false;
  return Object.freeze({
    maxAttempts: retriesDisabled ? 1 : Math.max(1, cfg.maxAttempts),
    initialDelayMs: cfg.initialDelayMs,
    backoffMultiplier: cfg.backoffMultiplier ?? 2,
    maxDelayMs: cfg.maxDelayMs ?? 30_000,
    retriesDisabled,
    isRetryable: isTransientFailure,
  });
}

/** Delay before retry number `retry` (0-based). */
export function backoffDelay(policy: RetryPolicy, retry: number): number {
  return Math.min(policy.initialDelayMs * policy.backoffMultiplier ** retry, policy.maxDelayMs);
}

export function attemptBudget(definition: Pick<TestDefinition, "options">, policy: RetryPolicy): number {
  if (policy.retriesDisabled) return 1;
  const override = definition.options.retries;
  return override !== undefined ? Math.max(1, override) : policy.maxAttempts;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function executeWithRetry(
  definition: Pick<TestDefinition, "options">,
  policy: RetryPolicy,
  attempt: (attemptNumber: number) => Promise<CallResult>,
  hooks: RetryHooks = {}
): Promise<RetryReport> {
  const sleep = hooks.sleep ?? defaultSleep;
  const budget = attemptBudget(definition, policy);

  let attempts = 0;
  for (;;) {
    attempts++;
    const result = await attempt(attempts);
    if (!policy.isRetryable(result.outcome)) {
      return { result, attempts, exhausted: false };
    }
    if (attempts >= budget) {
      return { result, attempts, exhausted: true };
    }
    const delayMs = backoffDelay(policy, attempts - 1);
    hooks.onRetry?.({ attempt: attempts, delayMs, reason: describeOutcome(result.outcome) });
    await sleep(delayMs);
  }
}
