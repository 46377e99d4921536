import type { Prober, ProbeFailure } from "./probe-client.js";
import { retry } from "../shared/retry.js";
import { MirrorError, MirrorErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Mirror lists and geolocation replies are much larger than a release index. */
const DOCUMENT_MAX_BYTES = 8 * 1024 * 1024;

class RetryableFetchError extends Error {
  constructor(readonly failure: ProbeFailure, url: string) {
    super(`GET ${url} failed: ${failure.kind === "unreachable" ? failure.message : `HTTP ${failure.status}`}`);
    this.name = "RetryableFetchError";
  }
}

export interface FetchTextOptions {
  readonly timeoutMs: number;
  /** Total tries, including the first. */
  readonly attempts: number;
  readonly backoffMs?: number;
  readonly signal?: AbortSignal;
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * GET a document through the prober, retrying indeterminate failures.
 * Throws MirrorError(DISCOVERY_FAILED) on 404 or once the attempts run out.
 */
export async function fetchText(prober: Prober, url: string, options: FetchTextOptions): Promise<string> {
  try {
    return await retry(
      async () => {
        const outcome = await prober.probe(url, {
          timeoutMs: options.timeoutMs,
          signal: options.signal,
          maxBodyBytes: DOCUMENT_MAX_BYTES,
        });
        if (outcome.kind === "success") return outcome.body;
        throw new RetryableFetchError(outcome, url);
      },
      {
        retries: Math.max(0, options.attempts - 1),
        minDelayMs: options.backoffMs ?? 1_000,
        maxDelayMs: 30_000,
        shouldRetry: (err) => err instanceof RetryableFetchError && err.failure.kind !== "not-found",
        onRetry: ({ attempt, maxAttempts, delayMs, error }) =>
          logger.warn({ url, attempt, maxAttempts, delayMs, error: String(error) }, "Retrying document fetch"),
        signal: options.signal,
        sleep: options.sleep,
      },
    );
  } catch (err) {
    throw new MirrorError(MirrorErrorCode.DISCOVERY_FAILED, err instanceof Error ? err.message : String(err), { url });
  }
}
