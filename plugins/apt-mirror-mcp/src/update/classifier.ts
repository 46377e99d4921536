// Classifies `apt-get update` output. Signatures are lowercase substrings
// matched against lowercased output; the lists below are defaults that config
// extends, not an exhaustive catalogue of apt's messages.
import type { ClassificationReason, SignatureSet, UpdateClassification } from "../types/update.js";
import { normalizeMirrorUrl } from "../mirrors/exclusions.js";

export const DEFAULT_SIGNATURES: SignatureSet = {
  fatal: [
    "permission denied",
    "are you root?",
    "no space left on device",
    "could not get lock",
    "unable to lock directory",
    "malformed entry",
    "malformed line",
    "the list of sources could not be read",
  ],
  mirror: [
    "hash sum mismatch",
    "file has unexpected size",
    "mirror sync in progress",
    "archive-update-in-progress",
  ],
  transient: [
    "temporary failure resolving",
    "could not resolve",
    "network is unreachable",
    "connection timed out",
    "connection reset by peer",
    "could not connect to",
    "unable to connect to",
    "connection failed",
  ],
  mirrorTimeout: [
    "connection timed out",
    "could not connect to",
    "unable to connect to",
    "connection failed",
  ],
};

export interface Classification {
  readonly kind: UpdateClassification;
  readonly reason: ClassificationReason;
  readonly signature: string | null;
}

/** Defaults plus extra signatures from config (lowercased, de-duplicated). */
export function mergeSignatures(extra: Partial<Record<keyof SignatureSet, readonly string[]>>, base: SignatureSet = DEFAULT_SIGNATURES): SignatureSet {
  const merge = (a: readonly string[], b: readonly string[] = []) => [...new Set([...a, ...b.map((s) => s.toLowerCase())])];
  return {
    fatal: merge(base.fatal, extra.fatal),
    mirror: merge(base.mirror, extra.mirror),
    transient: merge(base.transient, extra.transient),
    mirrorTimeout: merge(base.mirrorTimeout, extra.mirrorTimeout),
  };
}

function firstMatch(text: string, signatures: readonly string[]): string | null {
  return signatures.find((s) => text.includes(s)) ?? null;
}

/** Mirror URL without scheme, lowercased: `mirror.example.org/ubuntu`. */
function mirrorKey(mirrorUrl: string): string {
  return normalizeMirrorUrl(mirrorUrl).replace(/^[a-z]+:\/\//i, "").toLowerCase();
}

function mirrorHost(mirrorUrl: string): string {
  try {
    return new URL(mirrorUrl).hostname.toLowerCase();
  } catch {
    return mirrorKey(mirrorUrl).split("/")[0] ?? "";
  }
}

/** apt's `E:` and `Err:` lines. Notices (`N:`) and warnings (`W:`) never make a run fatal. */
function errorLines(lines: readonly string[]): string {
  return lines.filter((line) => /^(?:e|err):/.test(line.trimStart())).join("\n");
}

/**
 * A 404 or missing Release file for the current mirror. apt prints the URL on
 * an `Err:` line and the status on the indented line below it, so both are
 * checked. 404s from other repositories (PPAs) do not count.
 */
export function mentionsMissingRelease(lines: readonly string[], mirrorUrl: string): boolean {
  const key = mirrorKey(mirrorUrl);
  return lines.some((line, i) => {
    if (!line.includes(key)) return false;
    if (line.split(/\s+/).includes("404")) return true;
    if (line.includes("does not have a release file") || line.includes("no longer has a release file")) return true;
    const next = lines[i + 1];
    return next !== undefined && /^\s/.test(next) && next.trim().split(/\s+/)[0] === "404";
  });
}

/**
 * Order: fatal signatures (on error lines only), mirror faults, transient
 * faults, then exit status. A zero exit that carries a mirror or transient
 * signature is still a failure.
 */
export function classifyUpdateOutput(output: string, exitCode: number, mirrorUrl: string, signatures: SignatureSet = DEFAULT_SIGNATURES): Classification {
  const lower = output.toLowerCase();
  const lines = lower.split(/\r?\n/);

  const fatal = firstMatch(errorLines(lines), signatures.fatal);
  if (fatal) return { kind: "fatal", reason: "fatal-signature", signature: fatal };

  const mirror = firstMatch(lower, signatures.mirror);
  if (mirror) return { kind: "retryable-mirror", reason: "mirror-signature", signature: mirror };

  if (mentionsMissingRelease(lines, mirrorUrl)) return { kind: "retryable-mirror", reason: "release-missing", signature: "404" };

  const host = mirrorHost(mirrorUrl);
  for (const line of lines) {
    if (!host || !line.includes(host)) continue;
    const timeout = firstMatch(line, signatures.mirrorTimeout);
    if (timeout) return { kind: "retryable-mirror", reason: "mirror-timeout", signature: timeout };
  }

  const transient = firstMatch(lower, signatures.transient);
  if (transient) return { kind: "retryable-transient", reason: "transient-signature", signature: transient };

  return exitCode === 0
    ? { kind: "success", reason: "clean-exit", signature: null }
    : { kind: "fatal", reason: "unrecognized-failure", signature: null };
}
