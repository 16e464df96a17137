import type { JsonValue } from "../domain/types.js";

/**
 * Splits text holding one or more concatenated JSON documents (as written in
 * REQUEST sections and printed by grpcurl) into the raw text of each document.
 * Documents may be separated by whitespace or nothing at all.
 */
export function splitJsonDocuments(text: string): string[] {
  const docs: string[] = [];
  let i = 0;
  const n = text.length;

  while (i < n) {
    while (i < n && /\s/.test(text[i])) i++;
    if (i >= n) break;
    const start = i;
    const ch = text[i];

    if (ch === "{" || ch === "[") {
      let depth = 0;
      let inString = false;
      let escape = false;
      for (; i < n; i++) {
        const c = text[i];
        if (inString) {
          if (escape) escape = false;
          else if (c === "\\") escape = true;
          else if (c === '"') inString = false;
          continue;
        }
        if (c === '"') inString = true;
        else if (c === "{" || c === "[") depth++;
        else if (c === "}" || c === "]") {
          depth--;
          if (depth === 0) {
            i++;
            break;
          }
        }
      }
    } else if (ch === '"') {
      i++;
      let escape = false;
      for (; i < n; i++) {
        const c = text[i];
        if (escape) escape = false;
        else if (c === "\\") escape = true;
        else if (c === '"') {
          i++;
          break;
        }
      }
    } else {
      while (i < n && !/[\s{["]/.test(text[i])) i++;
    }
    docs.push(text.slice(start, i));
  }
  return docs;
}

/** Parses every document; throws the JSON.parse error of the first bad one. */
export function parseJsonDocuments(text: string): JsonValue[] {
  return splitJsonDocuments(text).map((doc) => {
    const parsed: JsonValue = JSON.parse(doc);
    return parsed;
  });
}
