import type { Distributor } from "./distributor.js";

/** Where a candidate URL came from. */
export type MirrorSource =
  | "mirror-list"
  | "launchpad"
  | "mirror-page"
  | "reference"
  | "current"
  | "custom"
  | "archive";

/** A mirror URL before any probing. Carries no health information. */
export interface CandidateMirror {
  readonly url: string;
  readonly source: MirrorSource;
}

export type Availability = "available" | "unavailable" | "unknown";

export type Staleness =
  | { readonly state: "up-to-date" }
  | { readonly state: "behind"; readonly seconds: number }
  | { readonly state: "unknown" };

export interface MirrorStatus {
  readonly availability: Availability;
  readonly isUpdating: boolean;
  readonly staleness: Staleness;
  /** Bytes per second, null when not measured. */
  readonly bandwidth: number | null;
  /** `Date:` field of the mirror's release index. */
  readonly indexDate: string | null;
}

/**
 * Ranking tiers:
 * 1 = available and not updating, 2 = available but updating, 3 = unavailable or unknown.
 */
export type RankTier = 1 | 2 | 3;

export interface RankedMirror extends CandidateMirror {
  readonly status: MirrorStatus;
  readonly rank: number;
  readonly tier: RankTier;
}

/** The release whose mirrors are being evaluated. */
export interface RankTarget {
  readonly distributor: Distributor;
  readonly codename: string;
  readonly architecture: string;
  /** Archive (old-releases) tier: freshness is not checked. */
  readonly archive: boolean;
}
