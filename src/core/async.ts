import { ConflictError } from "./errors.js";

export async function asyncPool<T, R>(
  concurrency: number,
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  async function runOne() {
    while (true) {
      const i = nextIndex++;
      if (i >= items.length) return;
      const item = items[i];
      if (item === undefined) return;
      results[i] = await worker(item, i);
    }
  }

  const workers = Array.from({ length: Math.max(1, concurrency) }, () => runOne());
  await Promise.all(workers);
  return results;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, ms));
}

export type RetryOptions = {
  retries: number;
  backoffMs: number;
  onRetry?: (attempt: number, error: ConflictError) => void;
};

/**
 * Re-runs `fn` while it fails with ConflictError, up to `retries` extra attempts,
 * doubling the delay each time. Any other error is rethrown at once.
 */
export async function withConflictRetry<T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> {
  let attempt = 0;
  while (true) {
    try {
      return await fn();
    } catch (e) {
      if (!(e instanceof ConflictError) || attempt >= opts.retries) throw e;
      attempt += 1;
      opts.onRetry?.(attempt, e);
      await sleep(opts.backoffMs * 2 ** (attempt - 1));
    }
  }
}
