import type { Prober } from "../http/probe-client.js";
import type { CandidateMirror } from "../types/mirror.js";

export interface DiscoveryContext {
  readonly prober: Prober;
  /** Country to filter mirror pages by; resolved lazily and at most once. */
  readonly country: () => Promise<string | null>;
  readonly timeoutMs: number;
  /** Tries per mirror-list fetch. */
  readonly attempts: number;
  readonly signal?: AbortSignal;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Produces candidate mirror URLs; throws MirrorError(DISCOVERY_FAILED) when none can be found. */
export type DiscoverMirrors = (ctx: DiscoveryContext) => Promise<CandidateMirror[]>;
