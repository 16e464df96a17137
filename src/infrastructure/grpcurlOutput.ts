import type { CallOutcome, JsonValue, RpcErrorPayload } from "../domain/types.js";
import { errorMessage } from "../domain/errors.js";
import { parseStatusCode } from "../domain/grpcStatus.js";
import { isJsonObject } from "../utils/objectUtils.js";
import { parseJsonDocuments } from "../utils/jsonDocuments.js";
import type { ProcessResult } from "./processRunner.js";

// grpcurl exits with 64 + status code for RPC failures
export const GRPCURL_STATUS_EXIT_BASE = 64;

export interface VerboseSections {
  headers: Record<string, string>;
  trailers: Record<string, string>;
  contents: string;
}

export interface InterpretedOutput {
  outcome: CallOutcome;
  messages: JsonValue[];
  headers: Record<string, string>;
  trailers: Record<string, string>;
  rawOutput: string;
}

type Section = "none" | "headers" | "contents" | "trailers";

const SECTION_HEADERS = new Map<string, Section>([
  ["Resolved method descriptor:", "none"],
  ["Request metadata to send:", "none"],
  ["Response headers received:", "headers"],
  ["Response contents:", "contents"],
  ["Response trailers received:", "trailers"],
]);

/** Splits `grpcurl -v` output into metadata maps and the raw message text. */
export function parseVerboseOutput(stdout: string): VerboseSections {
  const headers: Record<string, string> = {};
  const trailers: Record<string, string> = {};
  const contents: string[] = [];
  let section: Section = "none";

  for (const line of stdout.split(/\r?\n/)) {
    const trimmed = line.trim();
    const next = SECTION_HEADERS.get(trimmed);
    if (next) {
      section = next;
      continue;
    }
    if (/^Sent \d+ requests? and received \d+ responses?/.test(trimmed) || trimmed === "ERROR:") {
      section = "none";
      continue;
    }
    if (/^Estimated response size:/.test(trimmed)) continue;
    if (section === "contents") {
      contents.push(line);
      continue;
    }
    if (section === "headers" || section === "trailers") {
      if (!trimmed || trimmed === "(empty)") continue;
      const idx = trimmed.indexOf(":");
      if (idx <= 0) continue;
      const target = section === "headers" ? headers : trailers;
      target[trimmed.slice(0, idx).trim().toLowerCase()] = trimmed.slice(idx + 1).trim();
    }
  }
  return { headers, trailers, contents: contents.join("\n") };
}

function toPayload(doc: JsonValue): RpcErrorPayload | undefined {
  if (!isJsonObject(doc)) return undefined;
  const rawCode = doc.code;
  const code = typeof rawCode === "number" || typeof rawCode === "string" ? parseStatusCode(rawCode) : undefined;
  if (code === undefined || typeof doc.message !== "string") return undefined;
  const payload: RpcErrorPayload = { code, message: doc.message };
  if (doc.details !== undefined) payload.details = doc.details;
  return payload;
}

// Not JSON after all: callers fall back to the text form
function tryParseDocuments(text: string): JsonValue[] {
  try {
    return parseJsonDocuments(text);
  } catch {
    return [];
  }
}

/**
 * Finds the structured error grpcurl prints with `-format-error`, or the
 * `Code: ... / Message: ...` text form.
 */
export function parseErrorPayload(text: string): RpcErrorPayload | undefined {
  const brace = text.indexOf("{");
  const docs = brace >= 0 ? tryParseDocuments(text.slice(brace)) : [];
  for (const doc of docs) {
    const payload = toPayload(doc);
    if (payload) return payload;
  }

  const codeMatch = /^\s*Code:\s*(\w+)\s*$/m.exec(text);
  if (!codeMatch) return undefined;
  const code = parseStatusCode(codeMatch[1]);
  if (code === undefined) return undefined;
  const messageMatch = /^\s*Message:\s*(.*)$/m.exec(text);
  return { code, message: messageMatch ? messageMatch[1].trim() : "" };
}

function parseMessages(text: string): JsonValue[] {
  return text.trim() ? parseJsonDocuments(text) : [];
}

export function interpretGrpcurlResult(result: ProcessResult, verbose: boolean, timeoutMs?: number): InterpretedOutput {
  const rawOutput = [result.stdout, result.stderr].filter((s) => s.trim().length > 0).join("\n");
  const base = { headers: {}, trailers: {}, rawOutput };

  if (result.spawnError) {
    return { ...base, messages: [], outcome: { kind: "transport_error", message: `failed to start grpcurl: ${result.spawnError}` } };
  }
  if (result.timedOut) {
    return { ...base, messages: [], outcome: { kind: "transport_error", message: `timeout: grpcurl killed after ${timeoutMs ?? 0}ms` } };
  }

  let headers: Record<string, string> = {};
  let trailers: Record<string, string> = {};
  let contents = result.stdout;
  if (verbose) {
    const sections = parseVerboseOutput(result.stdout);
    ({ headers, trailers, contents } = sections);
  }

  let messages: JsonValue[];
  try {
    messages = parseMessages(contents);
  } catch (e) {
    if (result.exitCode === 0) {
      return { ...base, headers, trailers, messages: [], outcome: { kind: "transport_error", message: `unparseable grpcurl output: ${errorMessage(e)}` } };
    }
    messages = [];
  }

  if (result.exitCode === 0) {
    return { headers, trailers, rawOutput, messages, outcome: { kind: "success" } };
  }

  const payload = parseErrorPayload(result.stderr) ?? parseErrorPayload(result.stdout);
  if (payload) {
    return { headers, trailers, rawOutput, messages, outcome: { kind: "rpc_error", error: payload } };
  }
  if (result.exitCode > GRPCURL_STATUS_EXIT_BASE) {
    const error: RpcErrorPayload = { code: result.exitCode - GRPCURL_STATUS_EXIT_BASE, message: result.stderr.trim() };
    return { headers, trailers, rawOutput, messages, outcome: { kind: "rpc_error", error } };
  }
  const message = result.stderr.trim() || result.stdout.trim() || `grpcurl exited with code ${result.exitCode}`;
  return { headers, trailers, rawOutput, messages, outcome: { kind: "transport_error", message } };
}
