import type { JsonValue } from "../domain/types.js";
import type { PredicateEvaluator } from "../domain/usecases/evaluateAssertions.js";
import type { ProcessRunner } from "./processRunner.js";

export interface JqEvaluatorOptions {
  runner: ProcessRunner;
  bin?: string;
  timeoutMs?: number;
}

/**
 * Evaluates predicates with `jq -e`. The exit status decides: 0 passes (the
 * last output is neither false nor null), 1 fails, 4 (no output) fails. Any
 * other status rejects with jq's own error text.
 */
export class JqEvaluator implements PredicateEvaluator {
  private readonly runner: ProcessRunner;
  private readonly bin: string;
  private readonly timeoutMs: number;

  constructor(opts: JqEvaluatorOptions) {
    this.runner = opts.runner;
    this.bin = opts.bin ?? "jq";
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  async evaluate(json: JsonValue, predicate: string): Promise<boolean> {
    const result = await this.runner.run({
      command: this.bin,
      args: ["-e", "-c", predicate],
      stdin: JSON.stringify(json),
      timeoutMs: this.timeoutMs,
    });
    if (result.spawnError) throw new Error(`failed to start jq: ${result.spawnError}`);
    if (result.timedOut) throw new Error(`jq timed out after ${this.timeoutMs}ms`);
    switch (result.exitCode) {
      case 0:
        return true;
      case 1:
      case 4:
        return false;
      default:
        throw new Error(result.stderr.trim() || `jq exited with code ${result.exitCode}`);
    }
  }
}
