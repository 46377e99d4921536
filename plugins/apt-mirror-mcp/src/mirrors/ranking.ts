// Mirror ranking engine. Probes candidates in a bounded pool and orders them:
// available & not updating (fastest first), then available & updating, then
// everything else in input order. Probe failures degrade a single candidate;
// ranking itself never throws on them.
import type { CandidateMirror, MirrorStatus, RankedMirror, RankTarget, RankTier, Staleness } from "../types/mirror.js";
import type { Prober } from "../http/probe-client.js";
import { profileFor, archiveIndexPath, bandwidthPath, joinUrl } from "../backends/dispatch.js";
import { createLimiter, CancelledError } from "../shared/limiter.js";
import { deadlineSignal } from "../shared/signals.js";
import { ExclusionSet, normalizeMirrorUrl } from "./exclusions.js";
import { logger } from "../logger.js";

export interface RankTimeouts {
  /** Per HTTP request. */
  readonly requestMs: number;
  /** Per candidate, across all of its probes. */
  readonly mirrorMs: number;
}

export interface BandwidthSettings {
  readonly windowMs: number;
  readonly minBytes: number;
  readonly maxBytes: number;
}

export interface RankRequest {
  readonly candidates: readonly CandidateMirror[];
  readonly target: RankTarget;
  readonly exclusions: ExclusionSet;
  /** 0 probes every candidate. */
  readonly maxProbeCount: number;
  readonly concurrency: number;
  readonly timeouts: RankTimeouts;
  readonly bandwidth: BandwidthSettings;
  /** Base whose `Date:` is the staleness reference; defaults to the distributor's official archive. */
  readonly referenceUrl?: string;
  readonly signal?: AbortSignal;
}

export interface RankingResult {
  readonly mirrors: RankedMirror[];
  /** True when cancellation cut probing short; unprobed mirrors are `unknown`. */
  readonly interrupted: boolean;
  readonly referenceDate: string | null;
}

export const UNPROBED_STATUS: MirrorStatus = {
  availability: "unknown",
  isUpdating: false,
  staleness: { state: "unknown" },
  bandwidth: null,
  indexDate: null,
};

const DATE_FIELD = /^Date:\s*(.+?)\s*$/m;

/** The `Date:` field of a Release file, or null. */
export function extractIndexDate(body: string): string | null {
  return DATE_FIELD.exec(body)?.[1] ?? null;
}

/** Reference minus mirror; up-to-date when the mirror is not older. */
export function computeStaleness(referenceDate: string | null, mirrorDate: string | null): Staleness {
  if (!referenceDate || !mirrorDate) return { state: "unknown" };
  const reference = Date.parse(referenceDate);
  const mirror = Date.parse(mirrorDate);
  if (Number.isNaN(reference) || Number.isNaN(mirror)) return { state: "unknown" };
  const seconds = Math.round((reference - mirror) / 1000);
  return seconds <= 0 ? { state: "up-to-date" } : { state: "behind", seconds };
}

export function tierOf(status: MirrorStatus): RankTier {
  if (status.availability !== "available") return 3;
  return status.isUpdating ? 2 : 1;
}

/** Marker file some mirrors publish while an rsync is running. */
export function updateMarkerUrl(mirrorUrl: string): string {
  return joinUrl(mirrorUrl, `Archive-Update-in-Progress-${new URL(mirrorUrl).hostname}`);
}

/**
 * Stable order: tier, then bandwidth descending inside tier 1
 * (unmeasured after measured). Other tiers keep input order.
 */
export function sortByRank(entries: ReadonlyArray<CandidateMirror & { status: MirrorStatus }>): RankedMirror[] {
  return entries
    .map((entry, index) => ({ entry, index, tier: tierOf(entry.status) }))
    .sort((a, b) => {
      if (a.tier !== b.tier) return a.tier - b.tier;
      if (a.tier === 1) {
        const diff = (b.entry.status.bandwidth ?? -1) - (a.entry.status.bandwidth ?? -1);
        if (diff !== 0) return diff;
      }
      return a.index - b.index;
    })
    .map(({ entry, tier }, position) => ({ url: entry.url, source: entry.source, status: entry.status, tier, rank: position + 1 }));
}

/** De-duplicate by normalised URL (first wins), drop excluded, cap at maxProbeCount. */
export function selectCandidates(candidates: readonly CandidateMirror[], exclusions: ExclusionSet, maxProbeCount: number): CandidateMirror[] {
  const seen = new Set<string>();
  const selected: CandidateMirror[] = [];
  for (const candidate of candidates) {
    const url = normalizeMirrorUrl(candidate.url);
    if (seen.has(url)) continue;
    seen.add(url);
    if (exclusions.matches(url)) {
      logger.debug({ url }, "Mirror excluded");
      continue;
    }
    selected.push({ url, source: candidate.source });
  }
  return maxProbeCount > 0 ? selected.slice(0, maxProbeCount) : selected;
}

async function probeMirror(prober: Prober, url: string, request: RankRequest, referenceDate: string | null, signal: AbortSignal): Promise<MirrorStatus> {
  const { target, timeouts, bandwidth } = request;
  const indexPath = target.archive ? archiveIndexPath(target.codename) : profileFor(target.distributor).indexPath(target.codename);

  const [index, marker] = await Promise.all([
    prober.probe(joinUrl(url, indexPath), { timeoutMs: timeouts.requestMs, signal }),
    prober.probe(updateMarkerUrl(url), { method: "HEAD", timeoutMs: timeouts.requestMs, signal }),
  ]);

  let availability: MirrorStatus["availability"];
  let indexDate: string | null = null;
  if (index.kind === "success") {
    // A 200 without a Date: field is a parked domain or an error page.
    indexDate = extractIndexDate(index.body);
    availability = indexDate ? "available" : "unavailable";
  } else {
    availability = index.kind === "not-found" ? "unavailable" : "unknown";
  }
  const isUpdating = marker.kind === "success";
  const staleness: Staleness = target.archive ? { state: "up-to-date" } : computeStaleness(referenceDate, indexDate);

  let measured: number | null = null;
  if (availability === "available" && !isUpdating) {
    const rate = await prober.streamRate(joinUrl(url, bandwidthPath(target.codename, target.architecture)), {
      timeoutMs: timeouts.requestMs,
      windowMs: bandwidth.windowMs,
      minBytes: bandwidth.minBytes,
      maxBytes: bandwidth.maxBytes,
      signal,
    });
    if (rate.kind === "measured") measured = rate.bytesPerSecond;
  }

  return { availability, isUpdating, staleness, bandwidth: measured, indexDate };
}

/** Probe, classify and order candidate mirrors for one release. */
export async function rankMirrors(prober: Prober, request: RankRequest): Promise<RankingResult> {
  const { target, timeouts, signal } = request;
  const candidates = selectCandidates(request.candidates, request.exclusions, request.maxProbeCount);
  logger.info({ distributor: target.distributor, codename: target.codename, candidates: candidates.length, concurrency: request.concurrency }, "Ranking mirrors");

  let referenceDate: string | null = null;
  if (!target.archive && !signal?.aborted) {
    const referenceBase = request.referenceUrl ?? profileFor(target.distributor).referenceUrl;
    const reference = await prober.probe(joinUrl(referenceBase, profileFor(target.distributor).indexPath(target.codename)), {
      timeoutMs: timeouts.requestMs,
      signal,
    });
    referenceDate = reference.kind === "success" ? extractIndexDate(reference.body) : null;
    if (!referenceDate) logger.warn({ referenceBase, outcome: reference.kind }, "Reference index has no Date; staleness unknown");
  }

  // One slot per candidate; a worker only ever writes its own.
  const slots: Array<MirrorStatus | undefined> = candidates.map(() => undefined);
  const limit = createLimiter(Math.max(1, request.concurrency), signal);

  const settled = await Promise.allSettled(
    candidates.map((candidate, i) =>
      limit(async () => {
        const deadline = deadlineSignal(timeouts.mirrorMs, signal);
        try {
          slots[i] = await probeMirror(prober, candidate.url, request, referenceDate, deadline.signal);
        } finally {
          deadline.dispose();
        }
      }),
    ),
  );
  for (const [i, result] of settled.entries()) {
    if (result.status === "rejected" && !(result.reason instanceof CancelledError)) {
      logger.warn({ url: candidates[i]?.url, error: String(result.reason) }, "Mirror probe failed");
    }
  }

  const interrupted = signal?.aborted ?? false;
  const mirrors = sortByRank(candidates.map((candidate, i) => ({ ...candidate, status: slots[i] ?? UNPROBED_STATUS })));
  logger.info(
    { ranked: mirrors.length, available: mirrors.filter((m) => m.tier === 1).length, interrupted, best: mirrors[0]?.url },
    "Mirror ranking complete",
  );
  return { mirrors, interrupted, referenceDate };
}
