export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type ComparisonMode = "exact" | "partial";

export interface ToleranceRule {
  path: string;
  kind: "absolute" | "percentage";
  value: number;
}

export interface ComparisonOptions {
  mode: ComparisonMode;
  tolerances: ToleranceRule[];
  redactPaths: string[];
  // "all" sorts every array in the document; a list sorts only the addressed arrays
  unorderedArrays: "all" | string[];
  // RESPONSE and ASSERTS are both evaluated when set
  withAsserts: boolean;
}

export interface ExpectedError {
  code?: number;
  message?: string;
  details?: JsonValue;
}

export type AssertionGroup = string[];

export type TlsMode = "plaintext" | "insecure" | "tls" | "mtls";

export interface TlsConfig {
  mode: TlsMode;
  caCert?: string;
  cert?: string;
  key?: string;
  serverName?: string;
  authority?: string;
  insecureSkipVerify: boolean;
}

export type ProtoMode = "reflection" | "files" | "descriptor";

export interface ProtoConfig {
  mode: ProtoMode;
  files: string[];
  descriptor?: string;
  importPaths: string[];
}

export interface TestOptions {
  timeoutMs?: number;
  // attempt budget for this file; 0 or 1 disables retry
  retries?: number;
}

export interface TestDefinition {
  path: string;
  address?: string;
  endpoint: string;
  requests: JsonValue[];
  expectedResponse?: JsonValue;
  expectedError?: ExpectedError;
  assertions: AssertionGroup[];
  headers: Record<string, string>;
  tls: TlsConfig;
  proto: ProtoConfig;
  responseOptions: ComparisonOptions;
  options: TestOptions;
}

export interface RpcErrorPayload {
  code: number;
  message: string;
  details?: JsonValue;
}

export type CallOutcome =
  | { kind: "success" }
  | { kind: "rpc_error"; error: RpcErrorPayload }
  | { kind: "transport_error"; message: string };

export interface CallResult {
  outcome: CallOutcome;
  exitCode: number;
  messages: JsonValue[];
  headers: Record<string, string>;
  trailers: Record<string, string>;
  rawOutput: string;
  command: string[];
  durationMs: number;
  dryRun: boolean;
}

export type OutcomeStatus = "PASSED" | "FAILED" | "ERROR";

export type FailureDetail =
  | { kind: "comparison"; expected: JsonValue; actual: JsonValue; mismatches: string[] }
  | { kind: "unexpected_success"; actual: JsonValue[] }
  | { kind: "error_mismatch"; expected: ExpectedError; actual: string; reasons: string[] }
  | { kind: "unexpected_error"; exitCode: number; output: string }
  | { kind: "assertions"; groups: GroupReport[]; missingMessages?: { expected: number; received: number } }
  | { kind: "infrastructure"; reason: string; attempts?: number }
  | { kind: "definition"; reason: string };

export interface ExecutionOutcome {
  readonly testId: string;
  readonly status: OutcomeStatus;
  readonly durationMs: number;
  readonly detail: string;
  readonly failure?: FailureDetail;
}

export interface PredicateResult {
  predicate: string;
  expression: string;
  passed: boolean;
  error?: string;
}

export interface GroupReport {
  index: number;
  passed: boolean;
  results: PredicateResult[];
}

export interface BatchResult {
  outcomes: ExecutionOutcome[];
  failures: ExecutionOutcome[];
  durationMs: number;
}
