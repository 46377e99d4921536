import fs from 'fs';
import path from 'path';
import { DEBIAN_MIRRORS_URL, discoverDebianMirrors, parseDebianMirrorPage } from '../../../src/backends/debian.js';
import { MirrorError } from '../../../src/shared/errors.js';
import { FakeProber, ok } from '../../helpers/fake-prober.js';

const PAGE = fs.readFileSync(path.join(__dirname, '../../fixtures/debian-mirror-list.html'), 'utf-8');
const urls = (mirrors: Array<{ url: string }>) => mirrors.map((m) => m.url);

describe('parseDebianMirrorPage', () => {
  it('collects the rows under the country heading', () => {
    expect(urls(parseDebianMirrorPage(PAGE, 'Germany'))).toEqual([
      'http://a.de.example.org/debian/',
      'http://b.de.example.org/debian/',
      'https://c.de.example.org/debian/',
    ]);
  });

  it('adds the primary sites when a country has fewer than 3 mirrors', () => {
    expect(urls(parseDebianMirrorPage(PAGE, 'Austria'))).toEqual([
      'http://mirror1.at.example.org/debian/',
      'http://mirror2.at.example.org/debian/',
      'http://ftp.de.example.org/debian/',
      'http://ftp.us.example.org/debian/',
    ]);
  });

  it('uses the primary sites without a country or for an unlisted one', () => {
    const primary = ['http://ftp.de.example.org/debian/', 'http://ftp.us.example.org/debian/'];
    expect(urls(parseDebianMirrorPage(PAGE, null))).toEqual(primary);
    expect(urls(parseDebianMirrorPage(PAGE, 'Atlantis'))).toEqual(primary);
  });

  it('labels every candidate as coming from the mirror page', () => {
    expect(parseDebianMirrorPage(PAGE, 'Germany').every((m) => m.source === 'mirror-page')).toBe(true);
  });

  it('fails on a page without tables', () => {
    expect(() => parseDebianMirrorPage('<html><body><p>maintenance</p></body></html>', null)).toThrow(MirrorError);
  });
});

describe('discoverDebianMirrors', () => {
  it('fetches the mirror page and filters by the resolved country', async () => {
    const prober = new FakeProber().onProbe(DEBIAN_MIRRORS_URL, ok(PAGE));
    const mirrors = await discoverDebianMirrors({ prober, country: async () => 'Germany', timeoutMs: 1000, attempts: 1 });
    expect(mirrors).toHaveLength(3);
    expect(prober.urls()).toEqual([DEBIAN_MIRRORS_URL]);
  });
});
