import {
  computeStaleness, extractIndexDate, rankMirrors, selectCandidates, sortByRank, updateMarkerUrl, UNPROBED_STATUS,
  type RankRequest,
} from '../../../src/mirrors/ranking.js';
import { ExclusionSet } from '../../../src/mirrors/exclusions.js';
import type { ProbeOutcome, RateOutcome } from '../../../src/http/probe-client.js';
import type { RankTarget } from '../../../src/types/mirror.js';
import { FakeProber, NOT_FOUND, SERVER_ERROR, measured, ok } from '../../helpers/fake-prober.js';

const NOW = 'Wed, 14 Oct 2026 12:00:00 UTC';
const HOUR_AGO = 'Wed, 14 Oct 2026 11:00:00 UTC';
const TARGET: RankTarget = { distributor: 'ubuntu', codename: 'jammy', architecture: 'amd64', archive: false };
const REFERENCE_INDEX = 'http://archive.ubuntu.com/ubuntu/dists/jammy-security/Release';

const A = 'http://a.example.org/ubuntu';
const B = 'http://b.example.org/ubuntu';
const C = 'http://c.example.org/ubuntu';
const D = 'http://d.example.org/ubuntu';

const releaseFile = (date: string) => ok(`Origin: Ubuntu\nSuite: jammy-security\nDate: ${date}\nValid-Until: never\n`);

function serve(prober: FakeProber, base: string, opts: { index?: ProbeOutcome; rate?: RateOutcome; updating?: boolean } = {}): FakeProber {
  prober.onProbe(`${base}/dists/jammy-security/Release`, opts.index ?? releaseFile(NOW));
  if (opts.updating) prober.onProbe(`HEAD ${base}/Archive-Update-in-Progress-${new URL(base).hostname}`, ok());
  if (opts.rate) prober.onRate(`${base}/dists/jammy/main/binary-amd64/Packages.gz`, opts.rate);
  return prober;
}

function request(urls: string[], overrides: Partial<RankRequest> = {}): RankRequest {
  return {
    candidates: urls.map((url) => ({ url, source: 'custom' as const })),
    target: TARGET,
    exclusions: ExclusionSet.empty(),
    maxProbeCount: 0,
    concurrency: 4,
    timeouts: { requestMs: 1000, mirrorMs: 5000 },
    bandwidth: { windowMs: 2000, minBytes: 1, maxBytes: 1000 },
    ...overrides,
  };
}

const order = (mirrors: Array<{ url: string }>) => mirrors.map((m) => m.url);

describe('extractIndexDate', () => {
  it('reads the Date field of a Release file', () => {
    expect(extractIndexDate(`Origin: Debian\nDate: ${NOW}  \nSuite: stable\n`)).toBe(NOW);
  });

  it('returns null when the field is absent', () => {
    expect(extractIndexDate('<html>parked domain</html>')).toBeNull();
  });
});

describe('computeStaleness', () => {
  it('reports seconds behind the reference', () => {
    expect(computeStaleness(NOW, HOUR_AGO)).toEqual({ state: 'behind', seconds: 3600 });
  });

  it('treats a mirror at or ahead of the reference as up to date', () => {
    expect(computeStaleness(NOW, NOW)).toEqual({ state: 'up-to-date' });
    expect(computeStaleness(HOUR_AGO, NOW)).toEqual({ state: 'up-to-date' });
  });

  it('is unknown without both dates or with an unparseable one', () => {
    expect(computeStaleness(null, NOW)).toEqual({ state: 'unknown' });
    expect(computeStaleness(NOW, 'yesterday-ish')).toEqual({ state: 'unknown' });
  });
});

describe('updateMarkerUrl', () => {
  it('names the marker after the mirror host', () => {
    expect(updateMarkerUrl('http://a.example.org/ubuntu/')).toBe('http://a.example.org/ubuntu/Archive-Update-in-Progress-a.example.org');
  });
});

describe('selectCandidates', () => {
  it('de-duplicates, drops exclusions and caps the count in input order', () => {
    const candidates = [`${A}/`, A, B, C, D].map((url) => ({ url, source: 'custom' as const }));
    const selected = selectCandidates(candidates, ExclusionSet.of(['http://b.*']), 2);
    expect(selected).toEqual([{ url: A, source: 'custom' }, { url: C, source: 'custom' }]);
  });

  it('keeps every candidate when the cap is 0', () => {
    const candidates = [A, B, C].map((url) => ({ url, source: 'custom' as const }));
    expect(selectCandidates(candidates, ExclusionSet.empty(), 0)).toHaveLength(3);
  });
});

describe('sortByRank', () => {
  const status = (availability: 'available' | 'unavailable' | 'unknown', bandwidth: number | null, isUpdating = false) => ({
    ...UNPROBED_STATUS, availability, bandwidth, isUpdating,
  });

  it('keeps input order for ties and outside tier 1', () => {
    const ranked = sortByRank([
      { url: 'u1', source: 'custom', status: status('unknown', null) },
      { url: 't1a', source: 'custom', status: status('available', 100) },
      { url: 'u2', source: 'custom', status: status('unavailable', null) },
      { url: 't1b', source: 'custom', status: status('available', 100) },
      { url: 't1-unmeasured', source: 'custom', status: status('available', null) },
      { url: 't2', source: 'custom', status: status('available', null, true) },
    ]);
    expect(order(ranked)).toEqual(['t1a', 't1b', 't1-unmeasured', 't2', 'u1', 'u2']);
    expect(ranked.map((m) => m.rank)).toEqual([1, 2, 3, 4, 5, 6]);
    expect(ranked.map((m) => m.tier)).toEqual([1, 1, 1, 2, 3, 3]);
  });
});

describe('rankMirrors', () => {
  it('orders available mirrors by bandwidth and puts unavailable ones last', async () => {
    const prober = new FakeProber().onProbe(REFERENCE_INDEX, releaseFile(NOW));
    serve(prober, A, { rate: measured(500_000) });
    serve(prober, B, { rate: measured(900_000), index: releaseFile(HOUR_AGO) });
    serve(prober, C, { index: NOT_FOUND });

    const result = await rankMirrors(prober, request([A, B, C]));

    expect(order(result.mirrors)).toEqual([B, A, C]);
    expect(result.mirrors.map((m) => m.tier)).toEqual([1, 1, 3]);
    expect(result.interrupted).toBe(false);
    expect(result.referenceDate).toBe(NOW);
    const [b, a, c] = result.mirrors;
    expect(b?.status).toEqual({ availability: 'available', isUpdating: false, staleness: { state: 'behind', seconds: 3600 }, bandwidth: 900_000, indexDate: HOUR_AGO });
    expect(a?.status.staleness).toEqual({ state: 'up-to-date' });
    expect(c?.status).toEqual({ availability: 'unavailable', isUpdating: false, staleness: { state: 'unknown' }, bandwidth: null, indexDate: null });
  });

  it('ranks an updating mirror after idle ones and skips its bandwidth test', async () => {
    const prober = new FakeProber().onProbe(REFERENCE_INDEX, releaseFile(NOW));
    serve(prober, A, { updating: true, rate: measured(2_000_000) });
    serve(prober, B, { rate: measured(100_000) });
    serve(prober, C, { index: SERVER_ERROR });

    const result = await rankMirrors(prober, request([A, B, C]));

    expect(order(result.mirrors)).toEqual([B, A, C]);
    expect(result.mirrors.map((m) => m.tier)).toEqual([1, 2, 3]);
    expect(result.mirrors[1]?.status.isUpdating).toBe(true);
    expect(result.mirrors[2]?.status.availability).toBe('unknown');
    expect(prober.urls('rate')).toEqual([`${B}/dists/jammy/main/binary-amd64/Packages.gz`]);
  });

  it('treats a 200 without a Date field as unavailable', async () => {
    const prober = new FakeProber().onProbe(REFERENCE_INDEX, releaseFile(NOW));
    serve(prober, A, { index: ok('<html>This domain is for sale</html>') });
    const result = await rankMirrors(prober, request([A]));
    expect(result.mirrors[0]?.status.availability).toBe('unavailable');
    expect(result.mirrors[0]?.tier).toBe(3);
  });

  it('never probes excluded mirrors', async () => {
    const prober = new FakeProber().onProbe(REFERENCE_INDEX, releaseFile(NOW));
    serve(prober, A, { rate: measured(1000) });
    serve(prober, B, { rate: measured(2000) });

    const result = await rankMirrors(prober, request([A, B], { exclusions: ExclusionSet.of(['http://b.example.org/*']) }));

    expect(order(result.mirrors)).toEqual([A]);
    expect(prober.calls.some((c) => c.url.startsWith('http://b.example.org'))).toBe(false);
  });

  it('gives the same order when run twice against the same mirrors', async () => {
    const prober = new FakeProber().onProbe(REFERENCE_INDEX, releaseFile(NOW));
    serve(prober, A, { rate: measured(300) });
    serve(prober, B, { rate: measured(300) });
    serve(prober, C, { index: NOT_FOUND });
    serve(prober, D, { rate: measured(700) });

    const first = await rankMirrors(prober, request([A, B, C, D], { concurrency: 1 }));
    const second = await rankMirrors(prober, request([A, B, C, D], { concurrency: 3 }));

    expect(order(first.mirrors)).toEqual([D, A, B, C]);
    expect(order(second.mirrors)).toEqual(order(first.mirrors));
  });

  it('reports staleness as unknown when the reference has no Date', async () => {
    const prober = new FakeProber().onProbe(REFERENCE_INDEX, SERVER_ERROR);
    serve(prober, A, { rate: measured(1000) });
    const result = await rankMirrors(prober, request([A]));
    expect(result.referenceDate).toBeNull();
    expect(result.mirrors[0]?.status.staleness).toEqual({ state: 'unknown' });
    expect(result.mirrors[0]?.tier).toBe(1);
  });

  it('checks the archive tier without a reference or freshness check', async () => {
    const archive = 'http://old-releases.ubuntu.com/ubuntu';
    const prober = new FakeProber().onProbe(`${archive}/dists/jammy/Release`, releaseFile(HOUR_AGO));

    const result = await rankMirrors(prober, request([archive], { target: { ...TARGET, archive: true } }));

    expect(prober.urls()).not.toContain(REFERENCE_INDEX);
    expect(result.mirrors[0]?.status.availability).toBe('available');
    expect(result.mirrors[0]?.status.staleness).toEqual({ state: 'up-to-date' });
  });

  it('returns every candidate, unprobed ones as unknown, when cancelled mid-run', async () => {
    const controller = new AbortController();
    const prober = new FakeProber().onProbe(REFERENCE_INDEX, releaseFile(NOW));
    serve(prober, A, { rate: measured(1000) });
    prober.onProbe(`${A}/dists/jammy-security/Release`, () => {
      controller.abort();
      return releaseFile(NOW);
    });
    serve(prober, B, { rate: measured(5000) });
    serve(prober, C, { rate: measured(9000) });

    const result = await rankMirrors(prober, request([A, B, C], { concurrency: 1, signal: controller.signal }));

    expect(result.interrupted).toBe(true);
    expect(order(result.mirrors)).toEqual([A, B, C]);
    expect(result.mirrors.map((m) => m.status.availability)).toEqual(['available', 'unknown', 'unknown']);
    expect(prober.calls.some((c) => c.url.startsWith('http://b.example.org'))).toBe(false);
  });

  it('cuts a hung mirror off at its deadline without holding up the others', async () => {
    const prober = new FakeProber().onProbe(REFERENCE_INDEX, releaseFile(NOW));
    serve(prober, A, { rate: measured(1000) });
    serve(prober, B, { rate: measured(2000) });
    prober.onProbe(`${C}/dists/jammy-security/Release`, (_url, options) => new Promise<ProbeOutcome>((resolve) => {
      options.signal?.addEventListener('abort', () => resolve({ kind: 'unreachable', reason: 'timeout', message: 'deadline' }), { once: true });
    }));

    const started = Date.now();
    const result = await rankMirrors(prober, request([C, A, B], { concurrency: 2, timeouts: { requestMs: 1000, mirrorMs: 100 } }));

    expect(Date.now() - started).toBeLessThan(1000);
    expect(order(result.mirrors)).toEqual([B, A, C]);
    expect(result.mirrors[2]?.status.availability).toBe('unknown');
  });

  it('never has more mirrors in flight than the concurrency limit', async () => {
    const urls = ['a', 'b', 'c', 'd', 'e', 'f'].map((host) => `http://${host}.example.org/ubuntu`);
    const prober = new FakeProber().onProbe(REFERENCE_INDEX, releaseFile(NOW));
    let active = 0;
    let peak = 0;
    for (const url of urls) {
      prober.onProbe(`GET ${url}/dists/jammy-security/Release`, async () => {
        active += 1;
        peak = Math.max(peak, active);
        await new Promise<void>((resolve) => setTimeout(resolve, 10));
        active -= 1;
        return releaseFile(NOW);
      });
    }

    const result = await rankMirrors(prober, request(urls, { concurrency: 2 }));

    expect(peak).toBe(2);
    expect(result.mirrors.map((m) => m.tier)).toEqual([1, 1, 1, 1, 1, 1]);
  });

  it('probes nothing when cancelled before it starts', async () => {
    const controller = new AbortController();
    controller.abort();
    const prober = new FakeProber();
    const result = await rankMirrors(prober, request([A, B], { signal: controller.signal }));
    expect(result.interrupted).toBe(true);
    expect(result.mirrors.map((m) => m.status)).toEqual([UNPROBED_STATUS, UNPROBED_STATUS]);
    expect(prober.calls).toEqual([]);
  });
});
