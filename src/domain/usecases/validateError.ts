import type { ExpectedError, JsonValue } from "../types.js";
import { statusName } from "../grpcStatus.js";
import { canonicalize, compareDetailed, DEFAULT_COMPARISON_OPTIONS } from "./compareResponse.js";

export interface ActualError {
  code?: number;
  message: string;
  details?: JsonValue;
}

export interface ErrorValidation {
  matched: boolean;
  reasons: string[];
}

/**
 * Every field present in `expected` must match: `code` by equality,
 * `message` by substring, `details` as a partial document match.
 * An empty expectation accepts any error.
 */
export function validateExpectedError(expected: ExpectedError, actual: ActualError): ErrorValidation {
  const reasons: string[] = [];

  if (expected.code !== undefined && actual.code !== expected.code) {
    const got = actual.code === undefined ? "no status code" : `${actual.code} (${statusName(actual.code)})`;
    reasons.push(`code: expected ${expected.code} (${statusName(expected.code)}), got ${got}`);
  }

  if (expected.message !== undefined && !actual.message.includes(expected.message)) {
    reasons.push(`message: expected to contain ${JSON.stringify(expected.message)}, got ${JSON.stringify(actual.message)}`);
  }

  if (expected.details !== undefined) {
    if (actual.details === undefined) {
      reasons.push(`details: expected ${canonicalize(expected.details)}, got none`);
    } else {
      const report = compareDetailed(expected.details, actual.details, { ...DEFAULT_COMPARISON_OPTIONS, mode: "partial" });
      // mismatch paths are relative to the details document
      for (const m of report.mismatches) reasons.push(`details${m.startsWith(".:") ? m.slice(1) : m}`);
    }
  }

  return { matched: reasons.length === 0, reasons };
}
