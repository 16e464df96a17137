import type { JsonValue } from "../types.js";
import { ValidationError } from "../errors.js";
import { getValue, parseJqPath, resolvePaths } from "../../utils/objectUtils.js";

export interface VerbContext {
  // the streamed message the predicate runs against
  message: JsonValue;
  messageIndex: number;
  headers: Record<string, string>;
  trailers: Record<string, string>;
  durationMs: number;
}

export interface VerbDefinition {
  name: string;
  description?: string;
  // header/trailer access needs grpcurl's verbose output
  requiresMetadata?: boolean;
  evaluate: (context: VerbContext, ...args: JsonValue[]) => JsonValue;
}

export interface VerbCall {
  name: string;
  argsText: string;
  start: number;
  end: number;
}

const VERB_NAME = /^[A-Za-z_][A-Za-z0-9_]*/;

export class VerbRegistry {
  private readonly verbs = new Map<string, VerbDefinition>();
  private readonly builtins = new Set<string>();

  register(def: VerbDefinition, opts: { builtin?: boolean } = {}): void {
    if (!VERB_NAME.test(def.name) || VERB_NAME.exec(def.name)?.[0] !== def.name) {
      throw new ValidationError(`invalid verb name: ${def.name}`);
    }
    if (this.builtins.has(def.name)) {
      throw new ValidationError(`verb @${def.name} is built in and cannot be replaced`);
    }
    if (this.verbs.has(def.name)) {
      throw new ValidationError(`verb @${def.name} is already registered`);
    }
    this.verbs.set(def.name, def);
    if (opts.builtin) this.builtins.add(def.name);
  }

  get(name: string): VerbDefinition | undefined {
    return this.verbs.get(name);
  }

  has(name: string): boolean {
    return this.verbs.has(name);
  }

  isBuiltin(name: string): boolean {
    return this.builtins.has(name);
  }

  names(): string[] {
    return [...this.verbs.keys()].sort();
  }

  /** True when any predicate calls a verb that reads headers or trailers. */
  requiresMetadata(predicates: string[]): boolean {
    return predicates.some((p) => findVerbCalls(p).some((c) => this.verbs.get(c.name)?.requiresMetadata === true));
  }
}

// Scans for `@name(...)` outside string literals. jq formats such as `@base64`
// are left alone because they are not followed by a parenthesis.
export function findVerbCalls(predicate: string): VerbCall[] {
  const calls: VerbCall[] = [];
  let inString = false;
  let escape = false;
  let i = 0;
  while (i < predicate.length) {
    const ch = predicate[i];
    if (inString) {
      if (escape) escape = false;
      else if (ch === "\\") escape = true;
      else if (ch === '"') inString = false;
      i++;
      continue;
    }
    if (ch === '"') {
      inString = true;
      i++;
      continue;
    }
    if (ch === "@") {
      const m = VERB_NAME.exec(predicate.slice(i + 1));
      const open = m ? i + 1 + m[0].length : -1;
      if (m && predicate[open] === "(") {
        const close = findClosingParen(predicate, open);
        if (close < 0) throw new ValidationError(`unbalanced parentheses in @${m[0]}( call: ${predicate}`);
        calls.push({ name: m[0], argsText: predicate.slice(open + 1, close), start: i, end: close + 1 });
        i = close + 1;
        continue;
      }
    }
    i++;
  }
  return calls;
}

function findClosingParen(text: string, open: number): number {
  let depth = 0;
  let inSingle = false;
  let inDouble = false;
  let escape = false;
  for (let i = open; i < text.length; i++) {
    const ch = text[i];
    if (escape) { escape = false; continue; }
    if (ch === "\\" && (inSingle || inDouble)) { escape = true; continue; }
    if (!inDouble && ch === "'") { inSingle = !inSingle; continue; }
    if (!inSingle && ch === '"') { inDouble = !inDouble; continue; }
    if (inSingle || inDouble) continue;
    if (ch === "(") depth++;
    if (ch === ")") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

// Split by commas that are not inside quotes or nested parentheses
export function splitArguments(argsStr: string): string[] {
  if (!argsStr.trim()) return [];

  const parts: string[] = [];
  let current = "";
  let inSingle = false;
  let inDouble = false;
  let escape = false;
  let parenDepth = 0;

  for (let i = 0; i < argsStr.length; i++) {
    const ch = argsStr[i];

    if (escape) {
      current += ch;
      escape = false;
      continue;
    }

    if (ch === "\\") {
      current += ch;
      escape = inSingle || inDouble;
      continue;
    }

    if (!inSingle && !inDouble) {
      if (ch === "(") { parenDepth++; current += ch; continue; }
      if (ch === ")") { parenDepth = Math.max(0, parenDepth - 1); current += ch; continue; }
      if (ch === "," && parenDepth === 0) {
        parts.push(current.trim());
        current = "";
        continue;
      }
    }

    if (!inDouble && ch === "'") { inSingle = !inSingle; current += ch; continue; }
    if (!inSingle && ch === '"') { inDouble = !inDouble; current += ch; continue; }

    current += ch;
  }
  parts.push(current.trim());
  return parts;
}

export function parseArgument(raw: string, context: VerbContext): JsonValue {
  const trimmed = raw.trim();

  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    const decoded: unknown = JSON.parse(trimmed);
    return String(decoded);
  }
  if (trimmed.length >= 2 && trimmed.startsWith("'") && trimmed.endsWith("'")) {
    return trimmed.slice(1, -1);
  }
  if (/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/.test(trimmed)) return Number(trimmed);
  if (trimmed === "true" || trimmed === "false") return trimmed === "true";
  if (trimmed === "null") return null;

  if (trimmed.startsWith(".")) {
    const [first] = resolvePaths(context.message, parseJqPath(trimmed));
    return first ? getValue(context.message, first) ?? null : null;
  }

  throw new ValidationError(`unsupported verb argument: ${trimmed}`);
}

/** Rejects predicates that call verbs the registry does not know. */
export function validateVerbUsage(predicate: string, registry: VerbRegistry): void {
  for (const call of findVerbCalls(predicate)) {
    if (!registry.has(call.name)) {
      throw new ValidationError(`unknown verb @${call.name} in predicate: ${predicate}`);
    }
    const args = splitArguments(call.argsText);
    if (args.some((a) => a === "")) {
      throw new ValidationError(`empty argument in @${call.name}(...) in predicate: ${predicate}`);
    }
  }
}

/**
 * Evaluates every verb call in `predicate` and splices its JSON-encoded result
 * in place, leaving a plain jq expression.
 */
export function expandVerbs(predicate: string, registry: VerbRegistry, context: VerbContext): string {
  const calls = findVerbCalls(predicate);
  let out = predicate;
  for (const call of [...calls].reverse()) {
    const verb = registry.get(call.name);
    if (!verb) throw new ValidationError(`unknown verb @${call.name}`);
    const args = splitArguments(call.argsText).map((a) => parseArgument(a, context));
    const result = verb.evaluate(context, ...args);
    out = out.slice(0, call.start) + JSON.stringify(result) + out.slice(call.end);
  }
  return out;
}

// ----- built-in verbs -----

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const IPV4_RE = /^((25[0-5]|2[0-4]\d|[01]?\d\d?)\.){3}(25[0-5]|2[0-4]\d|[01]?\d\d?)$/;
const ISO8601_RE = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;
const RFC3339_RE = /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

function lookup(map: Record<string, string>, name: JsonValue): JsonValue {
  if (typeof name !== "string") return null;
  const key = name.toLowerCase();
  for (const [k, v] of Object.entries(map)) {
    if (k.toLowerCase() === key) return v;
  }
  return null;
}

/** `version` is `any` (default), `v1`/`1`, `v4`/`4` or `v5`/`5`. */
export function isUuid(value: JsonValue, version: JsonValue = "any"): boolean {
  if (typeof value !== "string" || !UUID_RE.test(value)) return false;
  if (version === null || version === "any") return true;
  const wanted = String(version).replace(/^v/i, "");
  if (!["1", "4", "5"].includes(wanted)) return false;
  return value[14] === wanted;
}

// digit counts of positive epoch values
const UNIX_DIGITS = new Map<JsonValue, number>([
  ["unix", 10],
  ["epoch", 10],
  ["unix_ms", 13],
  ["epoch_ms", 13],
  ["unix_us", 16],
  ["epoch_us", 16],
]);

export function isTimestamp(value: JsonValue, format: JsonValue = "iso8601"): boolean {
  switch (format) {
    case "rfc3339":
    case "rfc":
      return typeof value === "string" && RFC3339_RE.test(value) && !Number.isNaN(Date.parse(value));
    case "iso8601":
    case "iso":
      return typeof value === "string" && ISO8601_RE.test(value) && !Number.isNaN(Date.parse(value));
  }
  const digits = UNIX_DIGITS.get(format);
  if (digits === undefined) throw new ValidationError(`unknown timestamp format: ${String(format)}`);
  const text = typeof value === "number" && Number.isSafeInteger(value) ? String(value) : value;
  return typeof text === "string" && new RegExp(`^\\d{${digits}}$`).test(text) && /[1-9]/.test(text);
}

/** `scheme` is `any` (default) or the required scheme, such as `https`. */
export function isUrl(value: JsonValue, scheme: JsonValue = "any"): boolean {
  if (typeof value !== "string") return false;
  let u: URL;
  try {
    u = new URL(value);
  } catch {
    return false;
  }
  if (u.host.length === 0) return false;
  if (scheme === null || scheme === "any") return true;
  return u.protocol === `${String(scheme).toLowerCase()}:`;
}

export function isEmail(value: JsonValue): boolean {
  return typeof value === "string" && EMAIL_RE.test(value);
}

export function isIp(value: JsonValue, version: JsonValue = "any"): boolean {
  if (typeof value !== "string") return false;
  const v4 = IPV4_RE.test(value);
  const v6 = /^[0-9a-f:.]+$/i.test(value) && value.includes(":");
  switch (version) {
    case "v4": return v4;
    case "v6": return v6;
    case "any": return v4 || v6;
    default:
      throw new ValidationError(`unknown ip version: ${String(version)}`);
  }
}

export const BUILTIN_VERBS: readonly VerbDefinition[] = [
  {
    name: "header",
    description: "Value of a response header, or null",
    requiresMetadata: true,
    evaluate: (ctx, name = null) => lookup(ctx.headers, name),
  },
  {
    name: "trailer",
    description: "Value of a response trailer, or null",
    requiresMetadata: true,
    evaluate: (ctx, name = null) => lookup(ctx.trailers, name),
  },
  {
    name: "uuid",
    description: "Whether the value is a UUID, optionally of a given version (any, v1, v4, v5)",
    evaluate: (_ctx, value = null, version = "any") => isUuid(value, version),
  },
  {
    name: "timestamp",
    description: "Whether the value is a timestamp (iso8601/iso, rfc3339/rfc, unix/epoch, unix_ms, unix_us)",
    evaluate: (_ctx, value = null, format = "iso8601") => isTimestamp(value, format),
  },
  {
    name: "url",
    description: "Whether the value is an absolute URL, optionally with a given scheme",
    evaluate: (_ctx, value = null, scheme = "any") => isUrl(value, scheme),
  },
  {
    name: "email",
    description: "Whether the value is an email address",
    evaluate: (_ctx, value = null) => isEmail(value),
  },
  {
    name: "ip",
    description: "Whether the value is an IP address (any, v4 or v6)",
    evaluate: (_ctx, value = null, version = "any") => isIp(value, version),
  },
  {
    name: "response_time",
    description: "Call duration in milliseconds",
    evaluate: (ctx) => ctx.durationMs,
  },
];

export function createDefaultVerbRegistry(): VerbRegistry {
  const registry = new VerbRegistry();
  for (const verb of BUILTIN_VERBS) registry.register(verb, { builtin: true });
  return registry;
}
