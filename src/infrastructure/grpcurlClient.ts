import path from "path";
import * as grpc from "@grpc/grpc-js";
import { DRY_RUN_DEFAULT_RESPONSE } from "../domain/constants.js";
import type { CallExecutor, ExecuteOptions } from "../domain/ports.js";
import type { CallResult, ExpectedError, JsonValue, RpcErrorPayload, TestDefinition } from "../domain/types.js";
import { GRPCURL_STATUS_EXIT_BASE, interpretGrpcurlResult } from "./grpcurlOutput.js";
import { silentLogger, type Logger } from "./logger.js";
import type { ProcessRunner } from "./processRunner.js";

/** What a dry run reports instead of calling the server. */
export interface DryRunSimulation {
  response?: JsonValue;
  // `true` simulates a generic failure
  expectError?: ExpectedError | true;
}

export interface GrpcurlClientOptions {
  runner: ProcessRunner;
  bin?: string;
  logger?: Logger;
  dryRun?: DryRunSimulation;
  now?: () => number;
}

export const DRY_RUN_ERROR_MESSAGE = "DRY-RUN: Simulated gRPC error";

export function buildGrpcurlArgs(
  definition: TestDefinition,
  opts: Pick<ExecuteOptions, "address" | "timeoutMs" | "captureMetadata">
): string[] {
  const args: string[] = [];
  const { tls, proto } = definition;

  switch (tls.mode) {
    case "plaintext":
      args.push("-plaintext");
      break;
    case "insecure":
      args.push("-insecure");
      break;
    case "tls":
    case "mtls":
      if (tls.insecureSkipVerify) args.push("-insecure");
      if (tls.caCert) args.push("-cacert", tls.caCert);
      if (tls.mode === "mtls" && tls.cert && tls.key) args.push("-cert", tls.cert, "-key", tls.key);
      if (tls.serverName) args.push("-servername", tls.serverName);
      break;
  }
  if (tls.authority) args.push("-authority", tls.authority);

  if (proto.mode === "files") {
    // without import paths grpcurl only searches the working directory
    const importPaths = proto.importPaths.length > 0
      ? proto.importPaths
      : [...new Set(proto.files.map((f) => path.dirname(f)))];
    for (const p of importPaths) args.push("-import-path", p);
    for (const f of proto.files) args.push("-proto", f);
  } else if (proto.mode === "descriptor" && proto.descriptor) {
    args.push("-protoset", proto.descriptor);
  }

  for (const [name, value] of Object.entries(definition.headers)) {
    args.push("-H", `${name}: ${value}`);
  }

  args.push("-max-time", String(opts.timeoutMs / 1000));
  args.push("-format-error");
  if (opts.captureMetadata) args.push("-v");
  if (definition.requests.length > 0) args.push("-d", "@");

  args.push(opts.address, definition.endpoint);
  return args;
}

/** One compact JSON document per request message, newline separated. */
export function renderPayload(requests: JsonValue[]): string {
  return requests.map((r) => JSON.stringify(r)).join("\n");
}

function shellQuote(arg: string): string {
  if (/^[\w@%+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export function renderPreview(command: string[], payload: string): string {
  const line = command.map(shellQuote).join(" ");
  return payload ? `echo ${shellQuote(payload)} | ${line}` : line;
}

function toMessages(response: JsonValue): JsonValue[] {
  // a multi-document RESPONSE is held as an array of the documents
  return Array.isArray(response) && response.length !== 1 ? response : [response];
}

function simulatedError(expected: ExpectedError | true): RpcErrorPayload {
  if (expected === true) return { code: grpc.status.UNKNOWN, message: DRY_RUN_ERROR_MESSAGE };
  const payload: RpcErrorPayload = {
    code: expected.code ?? grpc.status.UNKNOWN,
    message: expected.message ?? DRY_RUN_ERROR_MESSAGE,
  };
  if (expected.details !== undefined) payload.details = expected.details;
  return payload;
}

/**
 * Drives the grpcurl executable. Non-zero exits are always interpreted and
 * returned, never thrown.
 */
export class GrpcurlClient implements CallExecutor {
  private readonly runner: ProcessRunner;
  private readonly bin: string;
  private readonly logger: Logger;
  private readonly simulation: DryRunSimulation;
  private readonly now: () => number;

  constructor(opts: GrpcurlClientOptions) {
    this.runner = opts.runner;
    this.bin = opts.bin ?? "grpcurl";
    this.logger = opts.logger ?? silentLogger;
    this.simulation = opts.dryRun ?? {};
    this.now = opts.now ?? Date.now;
  }

  async execute(definition: TestDefinition, options: ExecuteOptions): Promise<CallResult> {
    const command = [this.bin, ...buildGrpcurlArgs(definition, options)];
    const payload = renderPayload(definition.requests);

    if (options.dryRun) {
      this.logger.log(`[dry-run] ${definition.path}\n  ${renderPreview(command, payload)}`);
      return this.simulate(definition, command);
    }

    this.logger.debug(`grpcurl: ${renderPreview(command, payload)}`);
    const started = this.now();
    const result = await this.runner.run({
      command: this.bin,
      args: command.slice(1),
      stdin: payload,
      timeoutMs: options.timeoutMs,
    });
    const durationMs = this.now() - started;
    const interpreted = interpretGrpcurlResult(result, options.captureMetadata, options.timeoutMs);
    return { ...interpreted, exitCode: result.exitCode, command, durationMs, dryRun: false };
  }

  private simulate(definition: TestDefinition, command: string[]): CallResult {
    const base = { headers: {}, trailers: {}, command, durationMs: 0, dryRun: true, rawOutput: "" };
    const expectError = this.simulation.expectError ?? definition.expectedError;
    if (expectError !== undefined) {
      const error = simulatedError(expectError);
      return { ...base, outcome: { kind: "rpc_error", error }, exitCode: GRPCURL_STATUS_EXIT_BASE + error.code, messages: [], rawOutput: JSON.stringify(error) };
    }
    const response = this.simulation.response ?? definition.expectedResponse ?? DRY_RUN_DEFAULT_RESPONSE;
    const messages = toMessages(response);
    return { ...base, outcome: { kind: "success" }, exitCode: 0, messages, rawOutput: messages.map((m) => JSON.stringify(m)).join("\n") };
  }
}
