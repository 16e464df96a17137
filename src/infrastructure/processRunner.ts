import { spawn } from "child_process";

export interface ProcessRequest {
  command: string;
  args: readonly string[];
  stdin?: string;
  timeoutMs?: number;
  cwd?: string;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  // set when the executable could not be started at all
  spawnError?: string;
}

export interface ProcessRunner {
  run(request: ProcessRequest): Promise<ProcessResult>;
}

/**
 * Runs a command to completion, collecting both streams. Never rejects:
 * spawn failures and timeouts are reported in the result. On timeout the
 * child gets SIGKILL.
 */
export function createProcessRunner(): ProcessRunner {
  return {
    run({ command, args, stdin, timeoutMs, cwd }) {
      return new Promise<ProcessResult>((resolve) => {
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let timedOut = false;
        let settled = false;
        let timer: NodeJS.Timeout | undefined;

        const finish = (result: ProcessResult) => {
          if (settled) return;
          settled = true;
          if (timer) clearTimeout(timer);
          resolve(result);
        };

        const child = spawn(command, args, { cwd, shell: false, stdio: ["pipe", "pipe", "pipe"] });

        if (timeoutMs && timeoutMs > 0) {
          timer = setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, timeoutMs);
        }

        child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
        child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
        child.on("error", (error) => {
          finish({ exitCode: -1, stdout: "", stderr: "", timedOut: false, spawnError: error.message });
        });
        child.on("close", (code) => {
          finish({
            exitCode: code ?? -1,
            stdout: Buffer.concat(stdout).toString("utf8"),
            stderr: Buffer.concat(stderr).toString("utf8"),
            timedOut,
          });
        });

        // The child may exit before reading stdin (EPIPE)
        child.stdin.on("error", (error) => stderr.push(Buffer.from(`stdin: ${error.message}\n`)));
        child.stdin.end(stdin ?? "");
      });
    },
  };
}
