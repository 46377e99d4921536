import type { Executor, ExecResult } from "../execution/executor.js";
import type { Command } from "../types/command.js";
import type { UpdateRunner } from "./orchestrator.js";

/** `apt-get update` in the C locale so output signatures stay in English. */
export function aptUpdateCommand(extraArgs: readonly string[], sudo: boolean): Command {
  const env = { LC_ALL: "C", DEBIAN_FRONTEND: "noninteractive" };
  const argv = ["apt-get", "update", ...extraArgs];
  // sudo resets the environment, so the variables go through env(1) as well.
  return {
    argv: sudo ? ["sudo", "-n", "env", ...Object.entries(env).map(([k, v]) => `${k}=${v}`), ...argv] : argv,
    env,
  };
}

export class AptUpdateRunner implements UpdateRunner {
  constructor(
    private readonly executor: Executor,
    private readonly options: { timeoutMs: number; sudo: boolean },
  ) {}

  run(extraArgs: readonly string[], signal?: AbortSignal): Promise<ExecResult> {
    return this.executor.execute(aptUpdateCommand(extraArgs, this.options.sudo), this.options.timeoutMs, signal);
  }
}
