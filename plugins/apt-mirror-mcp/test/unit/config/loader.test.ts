import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, loadConfig, resolveConfig } from '../../../src/config/loader.js';
import { ConfigurationError } from '../../../src/shared/errors.js';

describe('resolveConfig', () => {
  it('returns the defaults for an empty file', () => {
    expect(resolveConfig(null)).toEqual(DEFAULT_CONFIG);
  });

  it('merges nested values over the defaults', () => {
    const config = resolveConfig({ ranking: { max_mirrors: 10 }, exclude: ['http://*.example.org/*'] });
    expect(config.ranking.max_mirrors).toBe(10);
    expect(config.ranking.request_timeout_seconds).toBe(10);
    expect(config.exclude).toEqual(['http://*.example.org/*']);
    expect(config.update).toEqual(DEFAULT_CONFIG.update);
  });

  it('rejects values outside the schema', () => {
    expect(() => resolveConfig({ ranking: { max_mirrors: -1 } })).toThrow(/^Invalid config <inline>: ranking\.max_mirrors: /);
    expect(() => resolveConfig({ target: { distributor: 'fedora' } })).toThrow(ConfigurationError);
  });

  it('rejects a document that is not a mapping', () => {
    expect(() => resolveConfig(['a'], 'test.yaml')).toThrow('Config test.yaml must be a mapping');
  });

  it('rejects malformed exclusion patterns', () => {
    expect(() => resolveConfig({ exclude: ['http://[abc'] })).toThrow("Unterminated '[' in exclusion pattern 'http://[abc'");
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'config-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes the defaults on first run and reads them back unchanged', async () => {
    const path = join(dir, 'nested', 'config.yaml');

    const first = loadConfig(path);
    expect(first).toEqual({ config: DEFAULT_CONFIG, configPath: path, firstRun: true });
    await expect(readFile(path, 'utf-8')).resolves.toMatch(/^# apt-mirror-mcp configuration\n/);

    const second = loadConfig(path);
    expect(second.firstRun).toBe(false);
    expect(second.config).toEqual(DEFAULT_CONFIG);
  });

  it('applies values from the file', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'target:\n  distributor: debian\n  codename: bookworm\nupdate:\n  max_attempts: 2\n', 'utf-8');
    const { config } = loadConfig(path);
    expect(config.target).toMatchObject({ distributor: 'debian', codename: 'bookworm', upstream_mode: false });
    expect(config.update.max_attempts).toBe(2);
  });

  it('reports YAML syntax errors with the path', async () => {
    const path = join(dir, 'config.yaml');
    await writeFile(path, 'target: [unclosed\n', 'utf-8');
    expect(() => loadConfig(path)).toThrow(`Cannot parse ${path}`);
  });
});
