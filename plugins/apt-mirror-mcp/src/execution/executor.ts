// Every command this server runs (apt-get, cp, install) goes through an
// Executor, so tests can substitute one that never touches the system.
import { execFile } from "node:child_process";
import type { Command } from "../types/command.js";
import { logger } from "../logger.js";

export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  /** 124 when the command was killed for running past its timeout, as timeout(1) reports it. */
  readonly exitCode: number;
  readonly durationMs: number;
}

export interface Executor {
  execute(command: Command, timeoutMs: number, signal?: AbortSignal): Promise<ExecResult>;
}

const TIMED_OUT = 124;

/** execFile without a shell; a failing command resolves with its exit code instead of rejecting. */
export class LocalExecutor implements Executor {
  execute(command: Command, timeoutMs: number, signal?: AbortSignal): Promise<ExecResult> {
    const [file, ...args] = command.argv;
    if (!file) return Promise.reject(new Error("Command has an empty argv"));
    const started = performance.now();

    return new Promise<ExecResult>((resolve) => {
      const child = execFile(
        file,
        args,
        {
          timeout: timeoutMs,
          // apt-get update on a long sources list prints a few hundred KiB at most.
          maxBuffer: 10 * 1024 * 1024,
          env: { ...process.env, ...command.env },
          signal,
        },
        (err, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - started);
          if (!err) {
            resolve({ stdout, stderr, exitCode: 0, durationMs });
            return;
          }
          const timedOut = err.killed === true && !signal?.aborted;
          const exitCode = timedOut ? TIMED_OUT : typeof err.code === "number" ? err.code : 1;
          logger.debug({ argv: command.argv, exitCode, durationMs, timedOut }, "Command failed");
          const output = timedOut ? [stderr, `${file} timed out after ${timeoutMs}ms`].filter(Boolean).join("\n") : stderr || err.message;
          resolve({ stdout, stderr: output, exitCode, durationMs });
        },
      );

      if (command.stdin !== undefined) child.stdin?.end(command.stdin);
    });
  }
}
