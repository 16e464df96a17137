import type { AssertionGroup, CallResult, GroupReport, JsonValue, PredicateResult } from "../types.js";
import { errorMessage } from "../errors.js";
import { expandVerbs, type VerbContext, type VerbRegistry } from "./verbs.js";

/** Evaluates one jq predicate against a JSON document. Rejects on jq errors. */
export interface PredicateEvaluator {
  evaluate(json: JsonValue, predicate: string): Promise<boolean>;
}

export interface AssertionDeps {
  evaluator: PredicateEvaluator;
  registry: VerbRegistry;
}

export interface AssertionReport {
  passed: boolean;
  groups: GroupReport[];
  missingMessages?: { expected: number; received: number };
}

async function evaluatePredicate(predicate: string, context: VerbContext, deps: AssertionDeps): Promise<PredicateResult> {
  let expression = predicate;
  try {
    expression = expandVerbs(predicate, deps.registry, context);
    const passed = await deps.evaluator.evaluate(context.message, expression);
    return { predicate, expression, passed };
  } catch (e) {
    return { predicate, expression, passed: false, error: errorMessage(e) };
  }
}

/**
 * Runs every predicate of a group (no short circuit) against one message.
 * The group passes only when all of them do.
 */
export async function evaluateGroup(
  predicates: AssertionGroup,
  context: VerbContext,
  deps: AssertionDeps,
  index = context.messageIndex
): Promise<GroupReport> {
  const results: PredicateResult[] = [];
  for (const predicate of predicates) {
    results.push(await evaluatePredicate(predicate, context, deps));
  }
  return { index, passed: results.every((r) => r.passed), results };
}

// Group N runs against streamed message N
export async function evaluateAssertions(
  groups: AssertionGroup[],
  call: Pick<CallResult, "messages" | "headers" | "trailers" | "durationMs">,
  deps: AssertionDeps
): Promise<AssertionReport> {
  const reports: GroupReport[] = [];
  const available = Math.min(groups.length, call.messages.length);
  for (let i = 0; i < available; i++) {
    const context: VerbContext = {
      message: call.messages[i],
      messageIndex: i,
      headers: call.headers,
      trailers: call.trailers,
      durationMs: call.durationMs,
    };
    reports.push(await evaluateGroup(groups[i], context, deps, i));
  }

  const passed = reports.every((r) => r.passed);
  if (groups.length > call.messages.length) {
    return {
      passed: false,
      groups: reports,
      missingMessages: { expected: groups.length, received: call.messages.length },
    };
  }
  return { passed, groups: reports };
}
