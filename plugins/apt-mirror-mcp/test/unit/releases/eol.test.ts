import { applicableEolDate, checkEol, isPastDate } from '../../../src/releases/eol.js';
import { ReleaseRegistry } from '../../../src/releases/registry.js';
import { loadReleaseTable } from '../../../src/releases/loader.js';
import { FakeProber, NOT_FOUND, SERVER_ERROR, ok } from '../../helpers/fake-prober.js';

const registry = new ReleaseRegistry(loadReleaseTable());
const now = () => new Date('2026-10-18T12:00:00Z');

function release(distributor: 'debian' | 'ubuntu' | 'linuxmint', codename: string) {
  const found = registry.find(distributor, codename);
  if (!found) throw new Error(`${codename} missing from release table`);
  return found;
}

describe('applicableEolDate', () => {
  it('applies Debian LTS only to LTS architectures', () => {
    expect(applicableEolDate(release('debian', 'bookworm'), 'amd64')).toBe('2028-06-30');
    expect(applicableEolDate(release('debian', 'bookworm'), 'mips64el')).toBe('2026-06-10');
  });

  it('gives an unknown architecture the extended date', () => {
    expect(applicableEolDate(release('debian', 'bookworm'), null)).toBe('2028-06-30');
  });

  it('applies Ubuntu ESM to every architecture', () => {
    expect(applicableEolDate(release('ubuntu', 'jammy'), 's390x')).toBe('2032-04-21');
  });

  it('falls back to the regular date without an extended one', () => {
    expect(applicableEolDate(release('ubuntu', 'mantic'), 'amd64')).toBe('2024-07-11');
  });
});

describe('isPastDate', () => {
  it('counts the EOL day itself as past', () => {
    expect(isPastDate('2026-06-10', new Date('2026-06-10T00:00:00Z'))).toBe(true);
    expect(isPastDate('2026-06-10', new Date('2026-06-09T23:59:59Z'))).toBe(false);
  });
});

describe('checkEol', () => {
  it('answers listed releases from the table without probing', async () => {
    const prober = new FakeProber();
    const report = await checkEol({ registry, prober, now }, { distributor: 'debian', codename: 'bookworm', architecture: 'amd64', timeoutMs: 1000 });
    expect(report).toMatchObject({ status: 'supported', source: 'release-table', eolDate: '2028-06-30' });
    expect(prober.calls).toEqual([]);
  });

  it('reports end-of-life once the applicable date has passed', async () => {
    const prober = new FakeProber();
    const bookworm = await checkEol({ registry, prober, now }, { distributor: 'debian', codename: 'bookworm', architecture: 'mips64el', timeoutMs: 1000 });
    const buster = await checkEol({ registry, prober, now }, { distributor: 'debian', codename: 'buster', architecture: 'amd64', timeoutMs: 1000 });
    expect(bookworm).toMatchObject({ status: 'end-of-life', eolDate: '2026-06-10' });
    expect(buster).toMatchObject({ status: 'end-of-life', eolDate: '2024-06-30' });
  });

  it('treats a release without an EOL date as supported', async () => {
    const report = await checkEol({ registry, prober: new FakeProber(), now }, { distributor: 'debian', codename: 'sid', timeoutMs: 1000 });
    expect(report.status).toBe('supported');
    expect(report.eolDate).toBeUndefined();
  });

  it('probes the security archive for unlisted codenames', async () => {
    const url = 'http://security.debian.org/debian-security/dists/zzcodename-security/Release';
    const prober = new FakeProber().onProbe(`HEAD ${url}`, NOT_FOUND);
    const report = await checkEol({ registry, prober, now }, { distributor: 'debian', codename: 'zzcodename', timeoutMs: 1000 });
    expect(report).toEqual({ status: 'end-of-life', source: 'security-mirror', checkedUrl: url });
    expect(prober.calls).toEqual([{ kind: 'probe', method: 'HEAD', url }]);
  });

  it('reports supported when the security index exists', async () => {
    const url = 'http://security.ubuntu.com/ubuntu/dists/zzcodename-security/Release';
    const prober = new FakeProber().onProbe(url, ok());
    const report = await checkEol({ registry, prober, now }, { distributor: 'ubuntu', codename: 'zzcodename', timeoutMs: 1000 });
    expect(report).toEqual({ status: 'supported', source: 'security-mirror', checkedUrl: url });
  });

  it('reports unknown on an indeterminate probe', async () => {
    const url = 'http://packages.linuxmint.com/dists/zzcodename/Release';
    const prober = new FakeProber().onProbe(url, SERVER_ERROR);
    const report = await checkEol({ registry, prober, now }, { distributor: 'linuxmint', codename: 'zzcodename', timeoutMs: 1000 });
    expect(report).toEqual({ status: 'unknown', source: 'security-mirror', checkedUrl: url });
  });
});
