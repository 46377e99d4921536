/** Rejection for tasks still queued when the limiter's signal aborts. */
export class CancelledError extends Error {
  constructor(message = "Cancelled before start") {
    super(message);
    this.name = "CancelledError";
  }
}

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Bounded worker pool. At most `concurrency` tasks run at once; the rest wait
 * in FIFO order. Once `signal` aborts, queued tasks reject with CancelledError
 * and running tasks are left to observe the signal themselves.
 *
 *   const limit = createLimiter(8, controller.signal);
 *   await Promise.allSettled(items.map((i) => limit(() => probe(i))));
 */
export const createLimiter = (concurrency: number, signal?: AbortSignal): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<{ run: () => void; cancel: () => void }> = [];

  const next = () => {
    if (active >= concurrency) return;
    const item = queue.shift();
    if (!item) return;
    if (signal?.aborted) {
      item.cancel();
      next();
      return;
    }
    active += 1;
    item.run();
  };

  signal?.addEventListener(
    "abort",
    () => {
      while (queue.length > 0) queue.shift()?.cancel();
    },
    { once: true },
  );

  return async <T>(task: () => Promise<T>): Promise<T> => {
    return new Promise<T>((resolve, reject) => {
      queue.push({
        run: () => {
          task()
            .then(resolve, reject)
            .finally(() => {
              active -= 1;
              next();
            });
        },
        cancel: () => reject(new CancelledError()),
      });
      next();
    });
  };
};

/** Default pool size: twice the CPU count, at least 4. */
export function defaultConcurrency(cpuCount: number): number {
  return Math.max(4, cpuCount * 2);
}
