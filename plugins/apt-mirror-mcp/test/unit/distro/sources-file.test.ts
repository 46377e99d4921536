import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { resolveSourcesListPath, SourcesListFile } from '../../../src/distro/sources-file.js';
import { MirrorError } from '../../../src/shared/errors.js';
import { FakeExecutor } from '../../helpers/fake-executor.js';

const OLD = 'http://old.example.org/ubuntu';
const NEW = 'http://new.example.org/ubuntu';
const ARCHIVE = 'http://old-releases.ubuntu.com/ubuntu';
const SECURITY = 'http://security.ubuntu.com/ubuntu';
const NOW = new Date(1_760_000_000_000);

const CONTENT = [
  `deb ${OLD}/ mantic main restricted`,
  `deb ${OLD} mantic-updates main`,
  `deb ${SECURITY} mantic-security main`,
  '',
].join('\n');

describe('SourcesListFile', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'sources-file-test-'));
    path = join(dir, 'sources.list');
    await writeFile(path, CONTENT, 'utf-8');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads the current mirror', async () => {
    const file = new SourcesListFile(path, new FakeExecutor(), { timeoutMs: 1000, sudo: false });
    await expect(file.currentMirror()).resolves.toBe(OLD);
  });

  it('backs up the file and installs the rewritten one', async () => {
    const executor = new FakeExecutor();
    const file = new SourcesListFile(path, executor, { timeoutMs: 1000, sudo: false, now: () => NOW });

    await file.switchMirror(OLD, NEW);

    const backup = `${path}.backup.1760000000`;
    await expect(readFile(backup, 'utf-8')).resolves.toBe(CONTENT);
    await expect(readFile(path, 'utf-8')).resolves.toBe([
      `deb ${NEW}/ mantic main restricted`,
      `deb ${NEW} mantic-updates main`,
      `deb ${SECURITY} mantic-security main`,
      '',
    ].join('\n'));
    expect(executor.calls[0]).toEqual(['cp', '-p', path, backup]);
    expect(executor.calls[1]?.slice(0, 3)).toEqual(['install', '-m', '0644']);
    expect(executor.calls[1]?.[4]).toBe(path);
  });

  it('prefixes privileged commands with sudo -n', async () => {
    const executor = new FakeExecutor();
    const file = new SourcesListFile(path, executor, { timeoutMs: 1000, sudo: true, now: () => NOW });
    await file.switchMirror(OLD, NEW);
    expect(executor.calls.map((argv) => argv.slice(0, 3))).toEqual([
      ['sudo', '-n', 'cp'],
      ['sudo', '-n', 'install'],
    ]);
  });

  it('moves security entries along when switching to the archive', async () => {
    const file = new SourcesListFile(path, new FakeExecutor(), {
      timeoutMs: 1000, sudo: false, archiveUrl: ARCHIVE, securityUrl: SECURITY, now: () => NOW,
    });
    await file.switchMirror(OLD, ARCHIVE);
    await expect(readFile(path, 'utf-8')).resolves.toBe([
      `deb ${ARCHIVE}/ mantic main restricted`,
      `deb ${ARCHIVE} mantic-updates main`,
      `deb ${ARCHIVE} mantic-security main`,
      '',
    ].join('\n'));
  });

  it('refuses a switch that would change nothing', async () => {
    const executor = new FakeExecutor();
    const file = new SourcesListFile(path, executor, { timeoutMs: 1000, sudo: false });
    await expect(file.switchMirror('http://absent.example.org/ubuntu', NEW)).rejects.toThrow(MirrorError);
    expect(executor.calls).toEqual([]);
  });

  it('reports a failed copy', async () => {
    const executor = new FakeExecutor();
    executor.failWith = 'cp: cannot create regular file: Permission denied\n';
    const file = new SourcesListFile(path, executor, { timeoutMs: 1000, sudo: false, now: () => NOW });
    await expect(file.switchMirror(OLD, NEW)).rejects.toThrow(
      `'cp -p ${path} ${path}.backup.1760000000' failed: cp: cannot create regular file: Permission denied`,
    );
    await expect(readFile(path, 'utf-8')).resolves.toBe(CONTENT);
  });

  it('wraps a missing file in a MirrorError', async () => {
    const file = new SourcesListFile(join(dir, 'missing.list'), new FakeExecutor(), { timeoutMs: 1000, sudo: false });
    await expect(file.currentMirror()).rejects.toThrow(MirrorError);
  });
});

describe('resolveSourcesListPath', () => {
  it('prefers the configured path', () => {
    expect(resolveSourcesListPath('/srv/apt/custom.list', () => true)).toBe('/srv/apt/custom.list');
  });

  it('finds a deb822 file before the classic list', () => {
    const present = new Set(['/etc/apt/sources.list.d/debian.sources']);
    expect(resolveSourcesListPath(null, (p) => present.has(p))).toBe('/etc/apt/sources.list.d/debian.sources');
  });

  it('falls back to /etc/apt/sources.list', () => {
    expect(resolveSourcesListPath(null, () => false)).toBe('/etc/apt/sources.list');
  });
});
