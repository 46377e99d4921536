// Smart update: run `apt-get update`, classify the outcome, and on mirror
// faults exclude the mirror, re-rank and switch before retrying.
//
//   idle -> running -> succeeded
//                   -> retryable-failure -> running (until max attempts)
//                   -> fatal-failure
import type { ExecResult } from "../execution/executor.js";
import type { EolReport } from "../types/release.js";
import type { RankedMirror } from "../types/mirror.js";
import type { SignatureSet, UpdateAttempt, UpdateFailureReason, UpdateResult, UpdateState } from "../types/update.js";
import { classifyUpdateOutput, DEFAULT_SIGNATURES } from "./classifier.js";
import { ExclusionSet, normalizeMirrorUrl } from "../mirrors/exclusions.js";
import { sleep as defaultSleep } from "../shared/signals.js";
import { logger } from "../logger.js";

/** Runs `apt-get update` with the given extra arguments. */
export interface UpdateRunner {
  run(extraArgs: readonly string[], signal?: AbortSignal): Promise<ExecResult>;
}

/** Reads and rewrites the configured mirror. */
export interface MirrorSwitcher {
  currentMirror(): Promise<string>;
  switchMirror(from: string, to: string): Promise<void>;
}

export interface UpdateDeps {
  readonly runner: UpdateRunner;
  readonly switcher: MirrorSwitcher;
  /** Re-rank with the given exclusions; the first tier 1/2 entry is the replacement. */
  readonly rank: (exclusions: ExclusionSet, signal?: AbortSignal) => Promise<readonly RankedMirror[]>;
  /** Consulted when apt reports the release missing from the current mirror. */
  readonly checkEol?: (signal?: AbortSignal) => Promise<EolReport>;
  /** Old-releases base for this release, or null. */
  readonly archiveUrl?: string | null;
  /** Whether the archive serves the release; the archive is only used when it does. */
  readonly confirmArchive?: (signal?: AbortSignal) => Promise<boolean>;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface UpdatePolicy {
  readonly maxAttempts: number;
  /** Transient failures retried on the same mirror before switching. */
  readonly sameMirrorRetries: number;
  /** First backoff between same-mirror retries; doubles each time. */
  readonly backoffMs: number;
  readonly signatures: SignatureSet;
}

export const DEFAULT_UPDATE_POLICY: UpdatePolicy = {
  maxAttempts: 5,
  sameMirrorRetries: 2,
  backoffMs: 10_000,
  signatures: DEFAULT_SIGNATURES,
};

export interface UpdateRequest {
  /** Passed verbatim to `apt-get update`. */
  readonly extraArgs?: readonly string[];
  readonly exclusions?: ExclusionSet;
  readonly signal?: AbortSignal;
}

function transition(from: UpdateState, to: UpdateState, fields: Record<string, unknown>): UpdateState {
  logger.debug({ from, to, ...fields }, "Update state transition");
  return to;
}

export async function smartUpdate(deps: UpdateDeps, policy: UpdatePolicy, request: UpdateRequest = {}): Promise<UpdateResult> {
  const sleep = deps.sleep ?? defaultSleep;
  const { signal } = request;
  const extraArgs = request.extraArgs ?? [];
  const attempts: UpdateAttempt[] = [];
  let exclusions = request.exclusions ?? ExclusionSet.empty();
  let mirror = await deps.switcher.currentMirror();
  let state: UpdateState = "idle";
  let transientRetries = 0;

  const finish = (outcome: "succeeded" | "fatal-failure", reason?: UpdateFailureReason): UpdateResult => {
    state = transition(state, outcome, { mirror, reason });
    const result: UpdateResult = {
      state: outcome,
      succeeded: outcome === "succeeded",
      attempts,
      retries: Math.max(0, attempts.length - 1),
      finalMirror: mirror,
      ...(reason ? { reason } : {}),
    };
    logger.info({ succeeded: result.succeeded, attempts: attempts.length, finalMirror: mirror, reason }, "Smart update finished");
    return result;
  };

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (signal?.aborted) return finish("fatal-failure", "cancelled");
    state = transition(state, "running", { attempt, mirror });

    const r = await deps.runner.run(extraArgs, signal);
    const output = [r.stdout, r.stderr].filter((s) => s !== "").join("\n");
    const cls = classifyUpdateOutput(output, r.exitCode, mirror, policy.signatures);
    attempts.push({
      attempt,
      mirror,
      classification: cls.kind,
      reason: cls.reason,
      signature: cls.signature,
      exitCode: r.exitCode,
      output,
      durationMs: r.durationMs,
    });
    logger.info({ attempt, mirror, classification: cls.kind, reason: cls.reason, signature: cls.signature }, "apt-get update attempt finished");

    if (cls.kind === "success") return finish("succeeded");
    // apt-get killed by the abort exits non-zero; that is not a fatal fault.
    if (signal?.aborted) return finish("fatal-failure", "cancelled");
    if (cls.kind === "fatal") return finish("fatal-failure", "fatal-error");
    state = transition(state, "retryable-failure", { attempt, classification: cls.kind });
    if (attempt === policy.maxAttempts) break;
    if (signal?.aborted) return finish("fatal-failure", "cancelled");

    if (cls.kind === "retryable-transient" && transientRetries < policy.sameMirrorRetries) {
      const delayMs = policy.backoffMs * Math.pow(2, transientRetries);
      transientRetries += 1;
      logger.warn({ attempt, delayMs, mirror }, "Transient failure; retrying same mirror after backoff");
      await sleep(delayMs, signal);
      continue;
    }

    let next: string | null = null;
    if (cls.reason === "release-missing") next = await archiveFor(deps, mirror, signal);
    if (next === null) {
      exclusions = exclusions.withMirror(mirror);
      try {
        const ranked = await deps.rank(exclusions, signal);
        next = ranked.find((m) => m.tier !== 3)?.url ?? null;
      } catch (err) {
        logger.error({ mirror, error: err instanceof Error ? err.message : String(err) }, "Re-ranking mirrors failed");
        return finish("fatal-failure", "rerank-failed");
      }
    }
    if (next === null) {
      logger.error({ mirror, excluded: exclusions.patterns }, "No alternative mirror available");
      return finish("fatal-failure", "no-alternative-mirror");
    }

    logger.warn({ from: mirror, to: next, attempt }, "Switching mirror before retry");
    try {
      await deps.switcher.switchMirror(mirror, next);
    } catch (err) {
      logger.error({ from: mirror, to: next, error: err instanceof Error ? err.message : String(err) }, "Switching mirror failed");
      return finish("fatal-failure", "switch-failed");
    }
    mirror = next;
    transientRetries = 0;
  }

  return finish("fatal-failure", "attempts-exhausted");
}

/**
 * The archive, when the release is end-of-life and the archive serves it;
 * null sends the caller to re-ranking. A failing EOL check counts as not EOL.
 */
async function archiveFor(deps: UpdateDeps, mirror: string, signal?: AbortSignal): Promise<string | null> {
  const archiveUrl = deps.archiveUrl;
  if (!deps.checkEol || !archiveUrl || normalizeMirrorUrl(archiveUrl) === normalizeMirrorUrl(mirror)) return null;
  try {
    const eol = await deps.checkEol(signal);
    if (eol.status !== "end-of-life") return null;
    if (deps.confirmArchive && !(await deps.confirmArchive(signal))) {
      logger.warn({ mirror, archive: archiveUrl }, "Release looks end-of-life but the archive does not serve it; re-ranking");
      return null;
    }
  } catch (err) {
    logger.warn({ mirror, error: err instanceof Error ? err.message : String(err) }, "EOL re-check failed; re-ranking");
    return null;
  }
  logger.warn({ mirror, archive: archiveUrl }, "Release is end-of-life; switching to old-releases archive");
  return archiveUrl;
}
