import type { ReportSink } from "../domain/ports.js";
import type { BatchResult, ExecutionOutcome, FailureDetail } from "../domain/types.js";
import type { Logger } from "../infrastructure/logger.js";

function indent(text: string, by = "    "): string {
  return text.split("\n").map((l) => by + l).join("\n");
}

function pretty(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function renderDetail(failure: FailureDetail): string[] {
  switch (failure.kind) {
    case "comparison":
      return [
        "  Expected:",
        indent(pretty(failure.expected)),
        "  Actual:",
        indent(pretty(failure.actual)),
        "  Mismatches:",
        ...failure.mismatches.map((m) => `    ${m}`),
      ];
    case "unexpected_success":
      return ["  Expected an error, got response:", indent(failure.actual.map((m) => pretty(m)).join("\n"))];
    case "error_mismatch":
      return [
        "  Expected error:",
        indent(pretty(failure.expected)),
        "  Actual error:",
        indent(failure.actual),
        ...failure.reasons.map((r) => `    ${r}`),
      ];
    case "unexpected_error":
      return [`  Exit code: ${failure.exitCode}`, "  Output:", indent(failure.output)];
    case "assertions": {
      const lines: string[] = [];
      if (failure.missingMessages) {
        lines.push(`  Streamed messages: expected at least ${failure.missingMessages.expected}, received ${failure.missingMessages.received}`);
      }
      for (const group of failure.groups) {
        lines.push(`  Group ${group.index + 1}: ${group.passed ? "passed" : "failed"}`);
        for (const r of group.results) {
          const mark = r.passed ? "[PASS]" : "[FAIL]";
          const shown = r.expression !== r.predicate ? `${r.predicate}  =>  ${r.expression}` : r.predicate;
          lines.push(`    ${mark} ${shown}${r.error ? ` (${r.error})` : ""}`);
        }
      }
      return lines;
    }
    case "infrastructure":
      return [`  Reason: ${failure.reason}${failure.attempts !== undefined ? ` [attempts: ${failure.attempts}]` : ""}`];
    case "definition":
      return [`  Reason: ${failure.reason}`];
  }
}

export function renderOutcomeLine(outcome: ExecutionOutcome): string {
  return `${outcome.status} ${outcome.testId} (${outcome.durationMs}ms)`;
}

/** Renders every failure of a batch with its diagnostics, followed by totals. */
export function renderFailureSummary(batch: BatchResult): string {
  const total = batch.outcomes.length;
  const failedCount = batch.failures.length;
  if (failedCount === 0) {
    return `All ${total} test(s) passed (${batch.durationMs}ms)`;
  }

  const lines: string[] = [`${failedCount} of ${total} test(s) did not pass (${batch.durationMs}ms)`, ""];
  for (const outcome of batch.failures) {
    lines.push(renderOutcomeLine(outcome));
    lines.push(`  ${outcome.detail}`);
    if (outcome.failure) lines.push(...renderDetail(outcome.failure));
    lines.push("");
  }
  const passedCount = batch.outcomes.filter((o) => o.status === "PASSED").length;
  const errored = batch.failures.filter((o) => o.status === "ERROR").length;
  lines.push(`passed: ${passedCount}, failed: ${failedCount - errored}, errors: ${errored}`);
  return lines.join("\n");
}

export function createConsoleReportSink(logger: Logger): ReportSink {
  return {
    onOutcome(outcome) {
      if (outcome.status === "PASSED") logger.log(renderOutcomeLine(outcome));
      else logger.err(renderOutcomeLine(outcome));
    },
    onBatchComplete(result) {
      const summary = renderFailureSummary(result);
      if (result.failures.length === 0) logger.log(summary);
      else logger.err(`\n${summary}`);
    },
  };
}
