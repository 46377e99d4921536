// discoverAndRank: EOL check -> tier selection -> candidate assembly -> ranking.
import type { Distributor } from "../types/distributor.js";
import type { CandidateMirror, RankedMirror, RankTarget } from "../types/mirror.js";
import type { EolReport, Release } from "../types/release.js";
import type { Prober } from "../http/probe-client.js";
import type { ReleaseRegistry } from "../releases/registry.js";
import type { DiscoverMirrors } from "../backends/types.js";
import { checkEol } from "../releases/eol.js";
import { archiveIndexPath, joinUrl, profileFor } from "../backends/dispatch.js";
import { locateCountry } from "../backends/locator.js";
import { rankMirrors, type BandwidthSettings, type RankTimeouts } from "./ranking.js";
import { ExclusionSet, normalizeMirrorUrl } from "./exclusions.js";
import { ConfigurationError } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface DiscoveryDeps {
  readonly prober: Prober;
  readonly registry: ReleaseRegistry;
  readonly now?: () => Date;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Replaces the dispatch table's backend for a distributor. */
  readonly backends?: Partial<Record<Distributor, DiscoverMirrors>>;
}

export interface DiscoveryRequest {
  readonly distributor: Distributor;
  readonly codename: string;
  readonly architecture: string;
  /** Linux Mint only: rank Ubuntu mirrors for the release Mint is built on. */
  readonly upstreamMode?: boolean;
  /** Skips geolocation when set. */
  readonly country?: string | null;
  /** Replaces backend discovery when non-empty. */
  readonly customMirrors?: readonly string[];
  /** The mirror sources.list points at now; always a candidate. */
  readonly currentMirror?: string | null;
  readonly exclusions?: ExclusionSet;
  readonly maxProbeCount: number;
  readonly concurrency: number;
  readonly timeouts: RankTimeouts;
  readonly bandwidth: BandwidthSettings;
  readonly discoveryAttempts: number;
  readonly signal?: AbortSignal;
}

export interface DiscoveryReport {
  readonly target: RankTarget;
  readonly release: Release | null;
  readonly eol: EolReport;
  /** Old-releases base in use for an end-of-life release, else null. */
  readonly archiveUrl: string | null;
  readonly mirrors: RankedMirror[];
  readonly interrupted: boolean;
  readonly referenceDate: string | null;
}

/** Accepts http, https and ftp mirror URLs; anything else is a ConfigurationError. */
export function validateMirrorUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    throw new ConfigurationError(`Invalid mirror URL '${url}'`, { url });
  }
  if (!["http:", "https:", "ftp:"].includes(parsed.protocol)) {
    throw new ConfigurationError(`Unsupported mirror URL scheme '${parsed.protocol}' in '${url}'`, { url });
  }
  return normalizeMirrorUrl(url);
}

/** One URL per line; blank lines and `#` comments are skipped. */
export function parseMirrorFile(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/#.*$/, "").trim())
    .filter((line) => line !== "")
    .map(validateMirrorUrl);
}

/** Distributor and codename whose mirrors are actually ranked. */
export function resolveEffectiveRelease(
  registry: ReleaseRegistry,
  request: Pick<DiscoveryRequest, "distributor" | "codename" | "upstreamMode">,
): { distributor: Distributor; codename: string; release: Release | null } {
  const release = registry.find(request.distributor, request.codename) ?? null;
  if (request.distributor === "linuxmint" && request.upstreamMode) {
    const upstream = release?.compatibleRepository;
    if (!upstream) {
      throw new ConfigurationError(`No Ubuntu release is recorded for Linux Mint '${request.codename}'; upstream mode needs one`, {
        codename: request.codename,
      });
    }
    return { distributor: "ubuntu", codename: upstream, release: registry.find("ubuntu", upstream) ?? null };
  }
  return { distributor: request.distributor, codename: release?.series ?? request.codename.toLowerCase(), release };
}

/**
 * An apparent end of life only moves a release to the archive tier when the
 * archive actually serves it.
 */
export async function archiveServesRelease(
  prober: Prober,
  archiveUrl: string,
  codename: string,
  options: { timeoutMs: number; signal?: AbortSignal },
): Promise<boolean> {
  const url = joinUrl(archiveUrl, archiveIndexPath(codename));
  const outcome = await prober.probe(url, { method: "HEAD", timeoutMs: options.timeoutMs, signal: options.signal });
  logger.debug({ url, outcome: outcome.kind }, "Archive tier confirmation");
  return outcome.kind === "success";
}

function memoize<T>(fn: () => Promise<T>): () => Promise<T> {
  let cached: Promise<T> | undefined;
  return () => (cached ??= fn());
}

export async function discoverAndRank(deps: DiscoveryDeps, request: DiscoveryRequest): Promise<DiscoveryReport> {
  const effective = resolveEffectiveRelease(deps.registry, request);
  const profile = profileFor(effective.distributor);

  const eol = await checkEol(
    { registry: deps.registry, prober: deps.prober, now: deps.now },
    {
      distributor: effective.distributor,
      codename: effective.codename,
      architecture: request.architecture,
      timeoutMs: request.timeouts.requestMs,
      signal: request.signal,
    },
  );

  let archiveUrl: string | null = null;
  if (eol.status === "end-of-life") {
    const where = { distributor: effective.distributor, codename: effective.codename };
    if (profile.archiveUrl === null) {
      logger.warn(where, "Release is end-of-life but has no archive tier; ranking regular mirrors");
    } else if (await archiveServesRelease(deps.prober, profile.archiveUrl, effective.codename, { timeoutMs: request.timeouts.requestMs, signal: request.signal })) {
      archiveUrl = profile.archiveUrl;
    } else {
      logger.warn({ ...where, archive: profile.archiveUrl }, "Release looks end-of-life but the archive does not serve it; ranking regular mirrors");
    }
  }

  const candidates: CandidateMirror[] = [];
  const custom = (request.customMirrors ?? []).map((url) => ({ url: validateMirrorUrl(url), source: "custom" as const }));
  if (archiveUrl) {
    candidates.push({ url: archiveUrl, source: "archive" }, ...custom);
  } else {
    candidates.push({ url: profile.referenceUrl, source: "reference" });
    if (request.currentMirror) candidates.push({ url: request.currentMirror, source: "current" });
    if (custom.length > 0) {
      candidates.push(...custom);
    } else {
      const discover = deps.backends?.[effective.distributor] ?? profile.discover;
      const country = request.country ?? null;
      const discovered = await discover({
        prober: deps.prober,
        country: country !== null ? async () => country : memoize(() => locateCountry(deps.prober, request.signal)),
        timeoutMs: request.timeouts.requestMs,
        attempts: request.discoveryAttempts,
        signal: request.signal,
        sleep: deps.sleep,
      });
      candidates.push(...discovered);
    }
  }

  const target: RankTarget = {
    distributor: effective.distributor,
    codename: effective.codename,
    architecture: request.architecture,
    archive: archiveUrl !== null,
  };
  const ranking = await rankMirrors(deps.prober, {
    candidates,
    target,
    exclusions: request.exclusions ?? ExclusionSet.empty(),
    maxProbeCount: request.maxProbeCount,
    concurrency: request.concurrency,
    timeouts: request.timeouts,
    bandwidth: request.bandwidth,
    signal: request.signal,
  });

  return { target, release: effective.release, eol, archiveUrl, ...ranking };
}

/** Best mirror of a report: the archive for end-of-life releases, else the top available one. */
export function selectBestMirror(report: Pick<DiscoveryReport, "archiveUrl" | "mirrors">): string | null {
  if (report.archiveUrl) return report.archiveUrl;
  return report.mirrors.find((m) => m.tier !== 3)?.url ?? null;
}
