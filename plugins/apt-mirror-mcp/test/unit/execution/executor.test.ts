import { LocalExecutor } from '../../../src/execution/executor.js';

// The Node binary running the tests is the one command known to exist everywhere.
const NODE = process.execPath;

describe('LocalExecutor', () => {
  const executor = new LocalExecutor();

  it('captures output and the exit code', async () => {
    const result = await executor.execute({ argv: [NODE, '-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)'] }, 10_000);
    expect(result).toMatchObject({ stdout: 'out', stderr: 'err', exitCode: 3 });
  });

  it('passes stdin and extra environment', async () => {
    const script = 'let s = ""; process.stdin.on("data", (d) => (s += d)); process.stdin.on("end", () => process.stdout.write(s + process.env.LC_ALL));';
    const result = await executor.execute({ argv: [NODE, '-e', script], env: { LC_ALL: 'C' }, stdin: 'locale=' }, 10_000);
    expect(result).toMatchObject({ stdout: 'locale=C', exitCode: 0 });
  });

  it('reports a command killed by its timeout as exit 124', async () => {
    const result = await executor.execute({ argv: [NODE, '-e', 'setTimeout(() => {}, 10_000)'] }, 200);
    expect(result.exitCode).toBe(124);
    expect(result.stderr).toBe(`${NODE} timed out after 200ms`);
  });

  it('rejects an empty argv', async () => {
    await expect(executor.execute({ argv: [] }, 1000)).rejects.toThrow('Command has an empty argv');
  });
});
