import { copyFile } from 'node:fs/promises';
import type { Executor, ExecResult } from '../../src/execution/executor.js';
import type { Command } from '../../src/types/command.js';

export const exec = (stdout: string, stderr = '', exitCode = 0): ExecResult => ({ stdout, stderr, exitCode, durationMs: 1 });

/**
 * Executor that performs `cp` and `install` with fs so files really change,
 * and answers `apt-get` from a queue of scripted results.
 */
export class FakeExecutor implements Executor {
  readonly calls: string[][] = [];
  readonly aptResults: ExecResult[] = [];
  failWith: string | null = null;

  async execute(command: Command): Promise<ExecResult> {
    const argv = [...command.argv];
    this.calls.push(argv);
    if (this.failWith !== null) return exec('', this.failWith, 1);

    const args = argv[0] === 'sudo' ? argv.slice(2) : argv;
    if (args.includes('apt-get')) {
      const next = this.aptResults.shift();
      if (!next) throw new Error('apt-get called more often than scripted');
      return next;
    }
    if (args[0] === 'cp' || args[0] === 'install') {
      const src = args[args.length - 2];
      const dest = args[args.length - 1];
      if (src && dest) await copyFile(src, dest);
    }
    return exec('');
  }
}
