import type { Prober, ProbeFailure, ProbeOptions, ProbeOutcome, RateOptions, RateOutcome } from '../../src/http/probe-client.js';

type ProbeRoute = ProbeOutcome | ((url: string, options: ProbeOptions) => ProbeOutcome | Promise<ProbeOutcome>);
type RateRoute = RateOutcome | ((url: string, options: RateOptions) => RateOutcome | Promise<RateOutcome>);

export const ok = (body = '', status = 200): ProbeOutcome => ({ kind: 'success', status, body, elapsedMs: 1 });
export const NOT_FOUND: ProbeOutcome = { kind: 'not-found', status: 404 };
export const SERVER_ERROR: ProbeOutcome = { kind: 'invalid-response', status: 500 };
export const UNREACHABLE: ProbeFailure = { kind: 'unreachable', reason: 'connection', message: 'connect ECONNREFUSED' };
export const measured = (bytesPerSecond: number): RateOutcome => ({ kind: 'measured', bytes: bytesPerSecond * 2, elapsedMs: 2000, bytesPerSecond });

/**
 * In-memory Prober. Routes are keyed by URL, or by `HEAD <url>` / `GET <url>`
 * for a method-specific answer; anything unrouted is unreachable.
 */
export class FakeProber implements Prober {
  readonly calls: Array<{ kind: 'probe' | 'rate'; method: string; url: string }> = [];
  private readonly probes = new Map<string, ProbeRoute>();
  private readonly rates = new Map<string, RateRoute>();

  onProbe(key: string, route: ProbeRoute): this {
    this.probes.set(key, route);
    return this;
  }

  onRate(url: string, route: RateRoute): this {
    this.rates.set(url, route);
    return this;
  }

  async probe(url: string, options: ProbeOptions): Promise<ProbeOutcome> {
    const method = options.method ?? 'GET';
    this.calls.push({ kind: 'probe', method, url });
    const route = this.probes.get(`${method} ${url}`) ?? this.probes.get(url);
    if (route === undefined) return UNREACHABLE;
    return typeof route === 'function' ? route(url, options) : route;
  }

  async streamRate(url: string, options: RateOptions): Promise<RateOutcome> {
    this.calls.push({ kind: 'rate', method: 'GET', url });
    const route = this.rates.get(url);
    if (route === undefined) return UNREACHABLE;
    return typeof route === 'function' ? route(url, options) : route;
  }

  urls(kind: 'probe' | 'rate' = 'probe'): string[] {
    return this.calls.filter((c) => c.kind === kind).map((c) => c.url);
  }
}
