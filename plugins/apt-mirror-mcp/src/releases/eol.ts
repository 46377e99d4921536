import type { Distributor } from "../types/distributor.js";
import type { EolReport, Release } from "../types/release.js";
import type { Prober } from "../http/probe-client.js";
import type { ReleaseRegistry } from "./registry.js";
import { profileFor } from "../backends/dispatch.js";
import { logger } from "../logger.js";

export interface EolDeps {
  readonly registry: ReleaseRegistry;
  readonly prober: Prober;
  readonly now?: () => Date;
}

export interface EolQuery {
  readonly distributor: Distributor;
  readonly codename: string;
  /** Unknown architecture gets the benefit of the extended date. */
  readonly architecture?: string | null;
  readonly timeoutMs: number;
  readonly signal?: AbortSignal;
}

/**
 * EOL date that governs `release` on `architecture`: the extended date when
 * present and covering the architecture, otherwise the regular one.
 */
export function applicableEolDate(release: Release, architecture?: string | null): string | null {
  if (release.extendedEolDate) {
    const covered = profileFor(release.distributor).extendedEolArchitectures;
    if (covered === null || !architecture || covered.includes(architecture)) return release.extendedEolDate;
  }
  return release.eolDate;
}

export function isPastDate(isoDate: string, now: Date): boolean {
  return now.getTime() >= Date.parse(`${isoDate}T00:00:00Z`);
}

/**
 * Supported / end-of-life / unknown for a release.
 * The table answers without touching the network. An unlisted codename is
 * checked against the security archive: 404 means end-of-life, an
 * indeterminate failure means unknown.
 */
export async function checkEol(deps: EolDeps, query: EolQuery): Promise<EolReport> {
  const now = deps.now?.() ?? new Date();
  const release = deps.registry.find(query.distributor, query.codename);

  if (release) {
    const eolDate = applicableEolDate(release, query.architecture);
    if (!eolDate) return { status: "supported", source: "release-table", release };
    const status = isPastDate(eolDate, now) ? "end-of-life" : "supported";
    logger.debug({ distributor: query.distributor, codename: release.series, eolDate, status }, "EOL from release table");
    return { status, source: "release-table", release, eolDate };
  }

  const checkedUrl = profileFor(query.distributor).securityProbeUrl(query.codename.toLowerCase());
  const outcome = await deps.prober.probe(checkedUrl, { method: "HEAD", timeoutMs: query.timeoutMs, signal: query.signal });
  logger.info({ distributor: query.distributor, codename: query.codename, checkedUrl, outcome: outcome.kind }, "EOL probed against security archive");
  switch (outcome.kind) {
    case "not-found":
      return { status: "end-of-life", source: "security-mirror", checkedUrl };
    case "success":
      return { status: "supported", source: "security-mirror", checkedUrl };
    case "invalid-response":
    case "unreachable":
      return { status: "unknown", source: "security-mirror", checkedUrl };
  }
}
