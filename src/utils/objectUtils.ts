import get from "lodash.get";
import type { JsonObject, JsonValue } from "../domain/types.js";

export type PathSegment =
  | { type: "key"; key: string }
  | { type: "index"; index: number }
  | { type: "each" };

export type ConcretePath = (string | number)[];

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*/;

export function isJsonObject(x: unknown): x is JsonObject {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isJsonValue(x: unknown): x is JsonValue {
  return x === null || ["string", "number", "boolean", "object"].includes(typeof x);
}

// Reads a JSON string literal starting at `start` (which must be a quote) and
// returns the decoded key plus the index just after the closing quote.
function readQuoted(path: string, start: number): { key: string; next: number } {
  let i = start + 1;
  let escaped = false;
  while (i < path.length) {
    const ch = path[i];
    if (escaped) {
      escaped = false;
    } else if (ch === "\\") {
      escaped = true;
    } else if (ch === '"') {
      const decoded: unknown = JSON.parse(path.slice(start, i + 1));
      return { key: String(decoded), next: i + 1 };
    }
    i++;
  }
  throw new Error(`unterminated string in path: ${path}`);
}

/**
 * Parses the subset of jq path syntax used by response options:
 * `.a.b`, `.a[0]`, `.a[-1]`, `.a[]`, `.["odd key"]`, `."odd key"`.
 */
export function parseJqPath(path: string): PathSegment[] {
  const trimmed = path.trim();
  if (!trimmed.startsWith(".")) throw new Error(`path must start with '.': ${path}`);
  if (trimmed === ".") return [];

  const segments: PathSegment[] = [];
  let i = 0;
  while (i < trimmed.length) {
    const ch = trimmed[i];
    if (ch === ".") {
      i++;
      if (i >= trimmed.length) throw new Error(`dangling '.' in path: ${path}`);
      if (trimmed[i] === "[") continue;
      if (trimmed[i] === '"') {
        const { key, next } = readQuoted(trimmed, i);
        segments.push({ type: "key", key });
        i = next;
        continue;
      }
      const m = IDENTIFIER.exec(trimmed.slice(i));
      if (!m) throw new Error(`invalid key at offset ${i} in path: ${path}`);
      segments.push({ type: "key", key: m[0] });
      i += m[0].length;
      continue;
    }
    if (ch === "[") {
      if (trimmed[i + 1] === '"') {
        const { key, next } = readQuoted(trimmed, i + 1);
        if (trimmed[next] !== "]") throw new Error(`expected ']' at offset ${next} in path: ${path}`);
        segments.push({ type: "key", key });
        i = next + 1;
        continue;
      }
      const close = trimmed.indexOf("]", i);
      if (close < 0) throw new Error(`unterminated '[' in path: ${path}`);
      const inner = trimmed.slice(i + 1, close).trim();
      if (inner === "") segments.push({ type: "each" });
      else if (/^-?\d+$/.test(inner)) segments.push({ type: "index", index: Number(inner) });
      else throw new Error(`invalid index '${inner}' in path: ${path}`);
      i = close + 1;
      continue;
    }
    throw new Error(`unexpected '${ch}' at offset ${i} in path: ${path}`);
  }
  return segments;
}

export function getValue(obj: JsonValue | undefined, path: ConcretePath): JsonValue | undefined {
  if (obj === undefined) return undefined;
  if (path.length === 0) return obj;
  const found: unknown = get(obj, path);
  return found !== undefined && isJsonValue(found) ? found : undefined;
}

/**
 * Expands a parsed path into the concrete paths it addresses in `root`.
 * Key and index segments always produce a path (the value may be absent);
 * `[]` only expands over containers that exist.
 */
export function resolvePaths(root: JsonValue | undefined, segments: PathSegment[]): ConcretePath[] {
  let frontier: ConcretePath[] = [[]];
  for (const seg of segments) {
    const next: ConcretePath[] = [];
    for (const p of frontier) {
      const here = getValue(root, p);
      if (seg.type === "key") {
        next.push([...p, seg.key]);
      } else if (seg.type === "index") {
        const idx = seg.index < 0 && Array.isArray(here) ? here.length + seg.index : seg.index;
        if (idx >= 0) next.push([...p, idx]);
      } else if (Array.isArray(here)) {
        here.forEach((_, idx) => next.push([...p, idx]));
      } else if (isJsonObject(here)) {
        for (const k of Object.keys(here)) next.push([...p, k]);
      }
    }
    frontier = next;
  }
  return frontier;
}

function parentOf(root: JsonValue, path: ConcretePath): { container: JsonValue | undefined; last: string | number } {
  return { container: getValue(root, path.slice(0, -1)), last: path[path.length - 1] };
}

/** Removes the value at `path` in place. Returns the (possibly replaced) root. */
export function deleteValue(root: JsonValue, path: ConcretePath): JsonValue {
  if (path.length === 0) return null;
  const { container, last } = parentOf(root, path);
  if (Array.isArray(container) && typeof last === "number") {
    if (last < container.length) container.splice(last, 1);
  } else if (isJsonObject(container) && typeof last === "string") {
    delete container[last];
  }
  return root;
}

/** Replaces the value at `path` in place when its parent exists. Returns the root. */
export function setValue(root: JsonValue, path: ConcretePath, value: JsonValue): JsonValue {
  if (path.length === 0) return value;
  const { container, last } = parentOf(root, path);
  if (Array.isArray(container) && typeof last === "number") {
    if (last < container.length) container[last] = value;
  } else if (isJsonObject(container) && typeof last === "string") {
    container[last] = value;
  }
  return root;
}

export function formatPath(path: ConcretePath): string {
  if (path.length === 0) return ".";
  return path
    .map((p) => (typeof p === "number" ? `[${p}]` : IDENTIFIER.test(p) && IDENTIFIER.exec(p)?.[0] === p ? `.${p}` : `.${JSON.stringify(p)}`))
    .join("");
}
