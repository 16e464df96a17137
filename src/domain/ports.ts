import type { BatchResult, CallResult, ExecutionOutcome, TestDefinition } from "./types.js";

export interface DefinitionSource {
  parse(path: string): Promise<TestDefinition>;
}

export interface ExecuteOptions {
  address: string;
  dryRun: boolean;
  captureMetadata: boolean;
  timeoutMs: number;
}

export interface CallExecutor {
  execute(definition: TestDefinition, options: ExecuteOptions): Promise<CallResult>;
}

export interface ProbeResult {
  reachable: boolean;
  error?: string;
}

export interface LivenessProbe {
  check(address: string): Promise<ProbeResult>;
}

export interface ProtoPreflight {
  /** Rejects with ValidationError or IoError when the endpoint cannot be resolved. */
  check(definition: Pick<TestDefinition, "path" | "endpoint" | "proto">): Promise<void>;
}

export interface ReportSink {
  onOutcome(outcome: ExecutionOutcome): void;
  onBatchComplete(result: BatchResult): void;
}
