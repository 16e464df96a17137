import { statusName } from "./grpcStatus.js";
import type { GroupReport, JsonValue, RpcErrorPayload } from "./types.js";

export type RunnerErrorKind =
  | "validation"
  | "io"
  | "transient_network"
  | "rpc_application"
  | "assertion_failure"
  | "comparison_mismatch"
  | "insufficient_messages";

/**
 * Base class for every failure the runner classifies.
 *
 * `kind` names the failure family. The orchestrator maps each subclass to an
 * outcome, so failures carry the data the report needs.
 */
export abstract class RunnerError extends Error {
  abstract readonly kind: RunnerErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Malformed definition file. Fatal to that test only. */
export class ValidationError extends RunnerError {
  readonly kind = "validation";

  constructor(message: string, public readonly file?: string, options?: { cause?: unknown }) {
    super(file ? `${file}: ${message}` : message, options);
  }
}

/** Unreadable file or socket. */
export class IoError extends RunnerError {
  readonly kind = "io";

  constructor(message: string, public readonly file?: string, options?: { cause?: unknown }) {
    super(file ? `${file}: ${message}` : message, options);
  }
}

/** A transient transport failure that outlived its retry budget. */
export class TransientNetworkError extends RunnerError {
  readonly kind = "transient_network";

  constructor(message: string, public readonly attempts: number) {
    super(message);
  }
}

/** The server answered with a status the definition did not expect. */
export class RpcApplicationError extends RunnerError {
  readonly kind = "rpc_application";

  constructor(public readonly payload: RpcErrorPayload, public readonly exitCode: number, public readonly output: string) {
    super(`call failed: ${statusName(payload.code)}: ${payload.message}`);
  }
}

export class AssertionFailure extends RunnerError {
  readonly kind = "assertion_failure";

  constructor(public readonly groups: GroupReport[]) {
    super(`${groups.filter((g) => !g.passed).length} of ${groups.length} assertion group(s) failed`);
  }
}

export class ComparisonMismatch extends RunnerError {
  readonly kind = "comparison_mismatch";

  constructor(public readonly expected: JsonValue, public readonly actual: JsonValue, public readonly mismatches: string[]) {
    super(`response mismatch (${mismatches.length} difference${mismatches.length === 1 ? "" : "s"})`);
  }
}

/** The stream ended before every ASSERTS group had a message. */
export class InsufficientMessages extends RunnerError {
  readonly kind = "insufficient_messages";

  constructor(public readonly expected: number, public readonly received: number, public readonly groups: GroupReport[]) {
    super(`expected at least ${expected} streamed messages, received ${received}`);
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
