import { sleep as defaultSleep } from "./signals.js";

export type RetryOptions = {
  retries: number; // extra attempts after the first (2 means up to 3 tries)
  minDelayMs: number;
  maxDelayMs: number;
  shouldRetry: (err: unknown) => boolean;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

/** Run `fn`, retrying with exponential backoff while `shouldRetry` accepts the error. */
export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const { retries, minDelayMs, maxDelayMs, shouldRetry, onRetry, signal, sleep = defaultSleep } = opts;
  const maxAttempts = retries + 1;
  let attempt = 0;

  while (true) {
    try {
      return await fn();
    } catch (err) {
      if (attempt >= retries || !shouldRetry(err) || signal?.aborted) throw err;
      const delayMs = Math.min(maxDelayMs, minDelayMs * Math.pow(2, attempt));
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs, error: err });
      await sleep(delayMs, signal);
      attempt += 1;
    }
  }
};
