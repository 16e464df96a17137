import { WILDCARD } from "../constants.js";
import type { ComparisonOptions, JsonObject, JsonValue, ToleranceRule } from "../types.js";
import {
  deleteValue,
  formatPath,
  getValue,
  isJsonObject,
  parseJqPath,
  resolvePaths,
  setValue,
  type ConcretePath,
} from "../../utils/objectUtils.js";

export interface ComparisonReport {
  equal: boolean;
  // both sides after redaction, tolerance and array normalization
  expected: JsonValue;
  actual: JsonValue;
  mismatches: string[];
}

export const DEFAULT_COMPARISON_OPTIONS: ComparisonOptions = {
  mode: "exact",
  tolerances: [],
  redactPaths: [],
  unorderedArrays: [],
  withAsserts: false,
};

function sortKeys(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (isJsonObject(value)) {
    const out: JsonObject = {};
    for (const k of Object.keys(value).sort()) out[k] = sortKeys(value[k]);
    return out;
  }
  return value;
}

/** Key-sorted, compact JSON encoding. Equal documents encode identically. */
export function canonicalize(value: JsonValue): string {
  return JSON.stringify(sortKeys(value));
}

function byCanonical(a: JsonValue, b: JsonValue): number {
  const ca = canonicalize(a);
  const cb = canonicalize(b);
  return ca < cb ? -1 : ca > cb ? 1 : 0;
}

function sortArraysDeep(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(sortArraysDeep).sort(byCanonical);
  if (isJsonObject(value)) {
    const out: JsonObject = {};
    for (const [k, v] of Object.entries(value)) out[k] = sortArraysDeep(v);
    return out;
  }
  return value;
}

function redact(doc: JsonValue, paths: string[]): JsonValue {
  let root = doc;
  for (const p of paths) {
    const concrete = resolvePaths(root, parseJqPath(p));
    // reverse keeps sibling array indices valid while splicing
    for (const c of concrete.reverse()) root = deleteValue(root, c);
  }
  return root;
}

function uniquePaths(...lists: ConcretePath[][]): ConcretePath[] {
  const seen = new Set<string>();
  const out: ConcretePath[] = [];
  for (const list of lists) {
    for (const p of list) {
      const key = JSON.stringify(p);
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(p);
    }
  }
  return out;
}

function roundDiff(n: number): number {
  return Number(n.toPrecision(12));
}

export function withinTolerance(expected: number, actual: number, rule: Pick<ToleranceRule, "kind" | "value">): boolean {
  const diff = roundDiff(Math.abs(expected - actual));
  if (rule.kind === "absolute") return diff <= rule.value;
  if (expected === 0) return actual === 0;
  return roundDiff((diff / Math.abs(expected)) * 100) <= rule.value;
}

function applyTolerances(
  expected: JsonValue,
  actual: JsonValue,
  rules: ToleranceRule[],
  mismatches: string[],
  failedPaths: Set<string>
): { expected: JsonValue; actual: JsonValue } {
  let exp = expected;
  let act = actual;
  for (const rule of rules) {
    const segments = parseJqPath(rule.path);
    const paths = uniquePaths(resolvePaths(exp, segments), resolvePaths(act, segments));
    const toRemove: ConcretePath[] = [];
    for (const p of paths) {
      const e = getValue(exp, p);
      const a = getValue(act, p);
      if (typeof e !== "number" || typeof a !== "number") {
        toRemove.push(p);
        continue;
      }
      if (withinTolerance(e, a, rule)) {
        act = setValue(act, p, e);
      } else {
        const unit = rule.kind === "percentage" ? "%" : "";
        failedPaths.add(formatPath(p));
        mismatches.push(`${formatPath(p)}: expected ${e} within ${rule.value}${unit}, got ${a}`);
      }
    }
    for (const p of toRemove.reverse()) {
      exp = deleteValue(exp, p);
      act = deleteValue(act, p);
    }
  }
  return { expected: exp, actual: act };
}

function sortListedArrays(doc: JsonValue, paths: string[]): JsonValue {
  let root = doc;
  for (const p of paths) {
    for (const c of resolvePaths(root, parseJqPath(p))) {
      const v = getValue(root, c);
      if (Array.isArray(v)) root = setValue(root, c, [...v].sort(byCanonical));
    }
  }
  return root;
}

function describe(v: JsonValue | undefined): string {
  return v === undefined ? "nothing" : canonicalize(v);
}

function diff(expected: JsonValue, actual: JsonValue | undefined, path: ConcretePath, partial: boolean, out: string[]): void {
  const where = formatPath(path);
  if (expected === WILDCARD) {
    if (actual === undefined || actual === null) out.push(`${where}: expected any non-null value, got ${describe(actual)}`);
    return;
  }
  if (actual === undefined) {
    out.push(`${where}: missing, expected ${describe(expected)}`);
    return;
  }
  if (Array.isArray(expected) && Array.isArray(actual)) {
    if (!partial && expected.length !== actual.length) {
      out.push(`${where}: expected ${expected.length} elements, got ${actual.length}`);
    }
    expected.forEach((e, i) => diff(e, actual[i], [...path, i], partial, out));
    return;
  }
  if (isJsonObject(expected) && isJsonObject(actual)) {
    for (const [k, e] of Object.entries(expected)) {
      diff(e, Object.prototype.hasOwnProperty.call(actual, k) ? actual[k] : undefined, [...path, k], partial, out);
    }
    if (!partial) {
      for (const k of Object.keys(actual)) {
        if (!Object.prototype.hasOwnProperty.call(expected, k)) out.push(`${formatPath([...path, k])}: unexpected field`);
      }
    }
    return;
  }
  if (canonicalize(expected) !== canonicalize(actual)) {
    out.push(`${where}: expected ${describe(expected)}, got ${describe(actual)}`);
  }
}

/**
 * Compares an expected document against an actual one. Redaction, tolerance
 * and array normalization are applied, in that order, to copies of both.
 */
export function compareDetailed(
  expected: JsonValue,
  actual: JsonValue,
  options: ComparisonOptions = DEFAULT_COMPARISON_OPTIONS
): ComparisonReport {
  const mismatches: string[] = [];
  const failedPaths = new Set<string>();
  let exp = redact(structuredClone(expected), options.redactPaths);
  let act = redact(structuredClone(actual), options.redactPaths);

  ({ expected: exp, actual: act } = applyTolerances(exp, act, options.tolerances, mismatches, failedPaths));

  if (options.unorderedArrays === "all") {
    exp = sortArraysDeep(exp);
    act = sortArraysDeep(act);
  } else if (options.unorderedArrays.length > 0) {
    exp = sortListedArrays(exp, options.unorderedArrays);
    act = sortListedArrays(act, options.unorderedArrays);
  }

  const structural: string[] = [];
  diff(exp, act, [], options.mode === "partial", structural);
  // tolerance failures already carry their own message
  for (const m of structural) {
    if (![...failedPaths].some((p) => m.startsWith(`${p}: `))) mismatches.push(m);
  }
  return { equal: mismatches.length === 0, expected: exp, actual: act, mismatches };
}

export function compare(expected: JsonValue, actual: JsonValue, options: ComparisonOptions = DEFAULT_COMPARISON_OPTIONS): boolean {
  return compareDetailed(expected, actual, options).equal;
}
