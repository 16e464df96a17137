import fs from "fs/promises";
import path from "path";
import { REPEATABLE_SECTIONS, SECTIONS, type SectionName } from "../domain/constants.js";
import { IoError, ValidationError, errorMessage } from "../domain/errors.js";
import { parseStatusCode } from "../domain/grpcStatus.js";
import type {
  AssertionGroup,
  ComparisonOptions,
  ExpectedError,
  JsonValue,
  ProtoConfig,
  ProtoMode,
  TestDefinition,
  TestOptions,
  TlsConfig,
  TlsMode,
} from "../domain/types.js";
import { splitArguments, validateVerbUsage, type VerbRegistry } from "../domain/usecases/verbs.js";
import { isJsonObject, parseJqPath } from "../utils/objectUtils.js";
import { parseJsonDocuments } from "../utils/jsonDocuments.js";
import { silentLogger, type Logger } from "./logger.js";

const MARKER_RE = /^\s*---\s*([A-Z_]+)(?:\s+(.*?))?\s*---\s*$/;
const ENDPOINT_RE = /^[A-Za-z_][\w.]*\/[A-Za-z_]\w*$/;

const KNOWN_SECTIONS = new Set<string>(Object.values(SECTIONS));

function isSectionName(name: string): name is SectionName {
  return KNOWN_SECTIONS.has(name);
}

interface RawSection {
  name: SectionName;
  modifiers: Map<string, string | true>;
  lines: string[];
  line: number;
}

export interface DefinitionParserOptions {
  registry: VerbRegistry;
  logger?: Logger;
}

/** Drops a trailing `#` comment unless the `#` sits inside a JSON string. */
export function stripInlineComment(line: string): string {
  let inString = false;
  let escape = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inString) {
      if (escape) escape = false;
      else if (ch === "\\") escape = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "#") return line.slice(0, i).trimEnd();
  }
  return line;
}

function unquote(value: string): string {
  const v = value.trim();
  if (v.length >= 2 && ((v.startsWith('"') && v.endsWith('"')) || (v.startsWith("'") && v.endsWith("'")))) {
    return v.slice(1, -1);
  }
  return v;
}

// Whitespace-separated, quote-aware
function tokenizeModifiers(text: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let quote: string | null = null;
  let bracketDepth = 0;
  for (const ch of text) {
    if (quote) {
      current += ch;
      if (ch === quote) quote = null;
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
      continue;
    }
    if (ch === "[") bracketDepth++;
    if (ch === "]") bracketDepth = Math.max(0, bracketDepth - 1);
    if (/\s/.test(ch) && bracketDepth === 0) {
      if (current) tokens.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  if (current) tokens.push(current);
  return tokens;
}

/**
 * `key=value`, `key[.path]=value` or a bare flag. The bracketed part may
 * itself contain brackets (`tolerance[.items[0].price]=0.1`).
 */
export function parseModifiers(text: string | undefined): Map<string, string | true> {
  const out = new Map<string, string | true>();
  if (!text) return out;
  for (const token of tokenizeModifiers(text)) {
    const name = /^[A-Za-z_][A-Za-z0-9_]*/.exec(token)?.[0];
    if (!name) throw new Error(`invalid modifier: ${token}`);
    let i = name.length;
    if (token[i] === "[") {
      let depth = 0;
      for (; i < token.length; i++) {
        if (token[i] === "[") depth++;
        if (token[i] === "]" && --depth === 0) break;
      }
      if (depth !== 0) throw new Error(`unbalanced brackets in modifier: ${token}`);
      i++;
    }
    const key = token.slice(0, i);
    if (i === token.length) {
      out.set(key, true);
    } else if (token[i] === "=") {
      out.set(key, unquote(token.slice(i + 1)));
    } else {
      throw new Error(`invalid modifier: ${token}`);
    }
  }
  return out;
}

function flag(value: string | true): boolean {
  if (value === true) return true;
  const v = value.toLowerCase();
  if (v === "true" || v === "1" || v === "yes") return true;
  if (v === "false" || v === "0" || v === "no") return false;
  throw new Error(`expected a boolean, got '${value}'`);
}

function pathList(value: string | true, key: string): string[] {
  if (value === true) throw new Error(`${key} needs a value`);
  const paths = splitArguments(value).map(unquote).filter((p) => p.length > 0);
  for (const p of paths) parseJqPath(p);
  return paths;
}

function nonNegative(value: string | true, key: string): number {
  const n = value === true ? NaN : Number(value);
  if (!Number.isFinite(n) || n < 0) throw new Error(`${key} must be a non-negative number`);
  return n;
}

export function parseResponseOptions(modifiers: Map<string, string | true>): ComparisonOptions {
  const options: ComparisonOptions = {
    mode: "exact",
    tolerances: [],
    redactPaths: [],
    unorderedArrays: [],
    withAsserts: false,
  };
  let unorderedAll = false;
  const unorderedPaths: string[] = [];

  for (const [key, value] of modifiers) {
    const bracket = /^(tolerance|tol_percent)\[(.*)\]$/.exec(key);
    if (bracket) {
      const [, kind, p] = bracket;
      parseJqPath(p);
      options.tolerances.push({
        path: p,
        kind: kind === "tolerance" ? "absolute" : "percentage",
        value: nonNegative(value, key),
      });
      continue;
    }
    switch (key) {
      case "mode":
      case "type":
        if (value !== "exact" && value !== "partial") throw new Error(`${key} must be exact or partial`);
        options.mode = value;
        break;
      case "partial":
        if (flag(value)) options.mode = "partial";
        break;
      case "redact":
        options.redactPaths.push(...pathList(value, key));
        break;
      case "unordered_arrays":
        unorderedAll = flag(value);
        break;
      case "unordered_arrays_paths":
        unorderedPaths.push(...pathList(value, key));
        break;
      case "with_asserts":
        options.withAsserts = flag(value);
        break;
      default:
        throw new Error(`unknown RESPONSE option '${key}'`);
    }
  }
  options.unorderedArrays = unorderedAll ? "all" : unorderedPaths;
  return options;
}

function keyValueLines(section: RawSection): Map<string, string> {
  const out = new Map<string, string>();
  section.lines.forEach((raw) => {
    const line = raw.trim();
    if (!line) return;
    const idx = line.indexOf(":");
    if (idx <= 0) throw new Error(`expected 'key: value' in ${section.name}, got '${line}'`);
    out.set(line.slice(0, idx).trim(), unquote(line.slice(idx + 1)));
  });
  return out;
}

function parseExpectedError(body: string): ExpectedError {
  const text = body.trim();
  if (!text) return {};
  if (!text.startsWith("{")) {
    return { message: unquote(text) };
  }
  const doc: unknown = JSON.parse(text);
  if (!isJsonObject(doc)) throw new Error("ERROR must be a JSON object");
  const expected: ExpectedError = {};
  for (const [k, v] of Object.entries(doc)) {
    if (k === "code") {
      const code = typeof v === "number" || typeof v === "string" ? parseStatusCode(v) : undefined;
      if (code === undefined) throw new Error(`unknown status code ${JSON.stringify(v)}`);
      expected.code = code;
    } else if (k === "message") {
      if (typeof v !== "string") throw new Error("ERROR message must be a string");
      expected.message = v;
    } else if (k === "details") {
      expected.details = v;
    } else {
      throw new Error(`unknown ERROR field '${k}'`);
    }
  }
  return expected;
}

const TLS_KEYS = new Set(["mode", "ca_cert", "cert", "key", "server_name", "authority", "insecure_skip_verify"]);

function parseTls(section: RawSection | undefined, baseDir: string): TlsConfig {
  if (!section) return { mode: "plaintext", insecureSkipVerify: false };
  const kv = keyValueLines(section);
  for (const k of kv.keys()) if (!TLS_KEYS.has(k)) throw new Error(`unknown TLS key '${k}'`);

  const file = (k: string) => {
    const v = kv.get(k);
    return v ? path.resolve(baseDir, v) : undefined;
  };
  const tls: TlsConfig = {
    mode: "plaintext",
    caCert: file("ca_cert"),
    cert: file("cert"),
    key: file("key"),
    serverName: kv.get("server_name") || undefined,
    authority: kv.get("authority") || undefined,
    insecureSkipVerify: kv.has("insecure_skip_verify") ? flag(kv.get("insecure_skip_verify") ?? "false") : false,
  };

  const mode = kv.get("mode");
  if (mode !== undefined) {
    if (mode !== "plaintext" && mode !== "insecure" && mode !== "tls" && mode !== "mtls") {
      throw new Error(`TLS mode must be plaintext, insecure, tls or mtls, got '${mode}'`);
    }
    tls.mode = mode;
  } else {
    tls.mode = deriveTlsMode(tls);
  }
  if (tls.mode === "mtls" && (!tls.cert || !tls.key)) throw new Error("mtls requires cert and key");
  return tls;
}

function deriveTlsMode(tls: TlsConfig): TlsMode {
  if (tls.cert && tls.key) return "mtls";
  if (tls.caCert) return "tls";
  if (tls.insecureSkipVerify) return "insecure";
  return "plaintext";
}

const PROTO_KEYS = new Set(["mode", "files", "descriptor", "import_paths"]);

function parseProto(section: RawSection | undefined, baseDir: string): ProtoConfig {
  if (!section) return { mode: "reflection", files: [], importPaths: [] };
  const kv = keyValueLines(section);
  for (const k of kv.keys()) if (!PROTO_KEYS.has(k)) throw new Error(`unknown PROTO key '${k}'`);

  const list = (k: string) => (kv.get(k) ?? "").split(",").map((s) => s.trim()).filter(Boolean).map((p) => path.resolve(baseDir, p));
  const files = list("files");
  const importPaths = list("import_paths");
  const descriptorRaw = kv.get("descriptor");
  const descriptor = descriptorRaw ? path.resolve(baseDir, descriptorRaw) : undefined;

  const explicit = kv.get("mode");
  let mode: ProtoMode;
  if (explicit !== undefined) {
    if (explicit !== "reflection" && explicit !== "files" && explicit !== "descriptor") {
      throw new Error(`PROTO mode must be reflection, files or descriptor, got '${explicit}'`);
    }
    mode = explicit;
  } else {
    mode = descriptor ? "descriptor" : files.length > 0 ? "files" : "reflection";
  }
  if (mode === "files" && files.length === 0) throw new Error("PROTO mode files requires files");
  if (mode === "descriptor" && !descriptor) throw new Error("PROTO mode descriptor requires descriptor");
  return { mode, files, descriptor, importPaths };
}

function parseOptions(section: RawSection | undefined, logger: Logger, file: string): TestOptions {
  const options: TestOptions = {};
  if (!section) return options;
  for (const [k, v] of keyValueLines(section)) {
    if (k === "timeout") {
      const seconds = Number(v);
      if (!Number.isFinite(seconds) || seconds <= 0) throw new Error("OPTIONS timeout must be a positive number of seconds");
      options.timeoutMs = Math.round(seconds * 1000);
    } else if (k === "retries") {
      const n = Number(v);
      if (!Number.isInteger(n) || n < 0) throw new Error("OPTIONS retries must be a non-negative integer");
      options.retries = n;
    } else {
      logger.warn(`${file}: ignoring unknown OPTIONS key '${k}'`);
    }
  }
  return options;
}

function parseHeaders(section: RawSection): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [k, v] of keyValueLines(section)) headers[k] = v;
  return headers;
}

function splitSections(content: string): RawSection[] {
  const sections: RawSection[] = [];
  let current: RawSection | null = null;
  const lines = content.split(/\r?\n/);

  lines.forEach((raw, idx) => {
    const lineNo = idx + 1;
    const marker = MARKER_RE.exec(raw);
    if (marker) {
      const name = marker[1];
      if (!isSectionName(name)) throw new Error(`line ${lineNo}: unknown section '${name}'`);
      let modifiers: Map<string, string | true>;
      try {
        modifiers = parseModifiers(marker[2]);
      } catch (e) {
        throw new Error(`line ${lineNo}: ${errorMessage(e)}`);
      }
      current = { name, modifiers, lines: [], line: lineNo };
      sections.push(current);
      return;
    }
    const trimmed = raw.trim();
    if (trimmed.startsWith("#")) return;
    if (!current) {
      if (trimmed) throw new Error(`line ${lineNo}: content outside of any section`);
      return;
    }
    current.lines.push(stripInlineComment(raw));
  });
  return sections;
}

/**
 * Parses `.gctf` definition files. Results are cached by absolute path and
 * modification time, so an edited file is parsed again.
 */
export class DefinitionParser {
  private readonly cache = new Map<string, { mtimeMs: number; definition: TestDefinition }>();
  private readonly registry: VerbRegistry;
  private readonly logger: Logger;

  constructor(opts: DefinitionParserOptions) {
    this.registry = opts.registry;
    this.logger = opts.logger ?? silentLogger;
  }

  async parse(file: string): Promise<TestDefinition> {
    const abs = path.resolve(file);
    let mtimeMs: number;
    let content: string;
    try {
      const stat = await fs.stat(abs);
      mtimeMs = stat.mtimeMs;
      const hit = this.cache.get(abs);
      if (hit && hit.mtimeMs === mtimeMs) return hit.definition;
      content = await fs.readFile(abs, "utf8");
    } catch (e) {
      throw new IoError(`cannot read definition: ${errorMessage(e)}`, abs, { cause: e });
    }
    const definition = this.parseContent(content, abs);
    this.cache.set(abs, { mtimeMs, definition });
    return definition;
  }

  parseContent(content: string, file: string): TestDefinition {
    try {
      return this.build(splitSections(content), file);
    } catch (e) {
      if (e instanceof ValidationError) throw e;
      throw new ValidationError(errorMessage(e), file, { cause: e });
    }
  }

  clearCache(): void {
    this.cache.clear();
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private build(sections: RawSection[], file: string): TestDefinition {
    const single = new Map<SectionName, RawSection>();
    for (const s of sections) {
      if (REPEATABLE_SECTIONS.includes(s.name)) continue;
      if (single.has(s.name)) throw new Error(`line ${s.line}: duplicate ${s.name} section`);
      if (s.name !== SECTIONS.RESPONSE && s.modifiers.size > 0) {
        throw new Error(`line ${s.line}: ${s.name} does not take modifiers`);
      }
      single.set(s.name, s);
    }
    const body = (s: RawSection) => s.lines.join("\n").trim();
    const at = <T>(s: RawSection, fn: () => T): T => {
      try {
        return fn();
      } catch (e) {
        throw new Error(`${s.name} (line ${s.line}): ${errorMessage(e)}`);
      }
    };

    const endpointSection = single.get(SECTIONS.ENDPOINT);
    if (!endpointSection) throw new Error("missing ENDPOINT section");
    const endpoint = body(endpointSection);
    if (!ENDPOINT_RE.test(endpoint)) {
      throw new Error(`ENDPOINT (line ${endpointSection.line}): expected 'package.Service/Method', got '${endpoint}'`);
    }

    const addressSection = single.get(SECTIONS.ADDRESS);
    const address = addressSection ? body(addressSection) : undefined;
    if (addressSection && !address) throw new Error(`ADDRESS (line ${addressSection.line}): empty address`);

    const requests: JsonValue[] = [];
    const assertions: AssertionGroup[] = [];
    for (const s of sections) {
      if (s.name === SECTIONS.REQUEST) {
        if (s.modifiers.size > 0) throw new Error(`line ${s.line}: REQUEST does not take modifiers`);
        requests.push(...at(s, () => parseJsonDocuments(body(s))));
      } else if (s.name === SECTIONS.ASSERTS) {
        if (s.modifiers.size > 0) throw new Error(`line ${s.line}: ASSERTS does not take modifiers`);
        const group = s.lines.map((l) => l.trim()).filter(Boolean);
        at(s, () => group.forEach((p) => validateVerbUsage(p, this.registry)));
        assertions.push(group);
      }
    }

    let expectedResponse: JsonValue | undefined;
    let responseOptions = parseResponseOptions(new Map());
    const responseSection = single.get(SECTIONS.RESPONSE);
    if (responseSection) {
      responseOptions = at(responseSection, () => parseResponseOptions(responseSection.modifiers));
      const docs = at(responseSection, () => parseJsonDocuments(body(responseSection)));
      if (docs.length === 0) throw new Error(`RESPONSE (line ${responseSection.line}): empty body`);
      expectedResponse = docs.length === 1 ? docs[0] : docs;
    }

    const errorSection = single.get(SECTIONS.ERROR);
    const expectedError = errorSection ? at(errorSection, () => parseExpectedError(body(errorSection))) : undefined;

    if (expectedResponse !== undefined && assertions.length > 0 && !responseOptions.withAsserts) {
      throw new Error("RESPONSE and ASSERTS together require the with_asserts option on RESPONSE");
    }

    let headers: Record<string, string> = {};
    const legacyHeaders = single.get(SECTIONS.HEADERS);
    if (legacyHeaders) {
      this.logger.warn(`${file}: HEADERS section is deprecated, use REQUEST_HEADERS`);
      headers = { ...headers, ...at(legacyHeaders, () => parseHeaders(legacyHeaders)) };
    }
    const requestHeaders = single.get(SECTIONS.REQUEST_HEADERS);
    if (requestHeaders) headers = { ...headers, ...at(requestHeaders, () => parseHeaders(requestHeaders)) };

    const baseDir = path.dirname(file);
    const tlsSection = single.get(SECTIONS.TLS);
    const protoSection = single.get(SECTIONS.PROTO);
    const optionsSection = single.get(SECTIONS.OPTIONS);

    return {
      path: file,
      address,
      endpoint,
      requests,
      expectedResponse,
      expectedError,
      assertions,
      headers,
      tls: tlsSection ? at(tlsSection, () => parseTls(tlsSection, baseDir)) : parseTls(undefined, baseDir),
      proto: protoSection ? at(protoSection, () => parseProto(protoSection, baseDir)) : parseProto(undefined, baseDir),
      responseOptions,
      options: optionsSection ? at(optionsSection, () => parseOptions(optionsSection, this.logger, file)) : {},
    };
  }
}
