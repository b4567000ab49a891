export interface ConcurrencyOptions {
  limit: number;
  signal?: AbortSignal;
}

/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Results keep
 * the input order regardless of completion order. Once `signal` aborts or a
 * worker rejects, no further items are started and the signal handed to the
 * in-flight workers is aborted.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  worker: (item: T, index: number, signal: AbortSignal) => Promise<R>,
  { limit, signal }: ConcurrencyOptions,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  const workers = Math.max(1, Math.min(limit, items.length));
  const controller = new AbortController();
  const abortFromCaller = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    controller.abort(signal.reason);
  }
  signal?.addEventListener("abort", abortFromCaller, { once: true });
  let cursor = 0;

  const runWorker = async () => {
    while (!controller.signal.aborted) {
      const index = cursor;
      cursor += 1;
      if (index >= items.length) {
        return;
      }
      try {
        results[index] = await worker(items[index], index, controller.signal);
      } catch (error) {
        controller.abort(error);
        throw error;
      }
    }
  };

  try {
    await Promise.all(Array.from({ length: workers }, () => runWorker()));
  } finally {
    signal?.removeEventListener("abort", abortFromCaller);
  }
  return results;
}

export function whenAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

export function withTimeout(signal: AbortSignal | undefined, timeoutMs: number): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}
