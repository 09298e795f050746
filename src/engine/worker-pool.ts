export interface WorkerPoolOptions {
  readonly concurrency: number;
  /** Workers stop taking items once this aborts. */
  readonly signal?: AbortSignal;
}

export interface WorkerPoolOutcome {
  readonly processed: number;
  readonly aborted: boolean;
}

/**
 * Drain `items` with at most `concurrency` handlers in flight. Every worker
 * pulls from the same iterator, so a lazy source is read once and never
 * buffered. Resolves only after every worker has stopped; the first handler
 * or source failure is rethrown after that barrier.
 */
export async function runWorkerPool<T>(
  items: AsyncIterable<T>,
  handler: (item: T, workerId: number) => Promise<void>,
  options: WorkerPoolOptions,
): Promise<WorkerPoolOutcome> {
  const iterator = items[Symbol.asyncIterator]();
  const signal = options.signal;
  const workerCount = Math.max(1, Math.floor(options.concurrency));
  let processed = 0;
  let failed = false;

  const work = async (workerId: number): Promise<void> => {
    while (!failed && !signal?.aborted) {
      const next = await iterator.next();
      if (next.done || signal?.aborted) {
        return;
      }
      await handler(next.value, workerId);
      processed += 1;
    }
  };

  const settled = await Promise.allSettled(
    Array.from({ length: workerCount }, (_, workerId) =>
      work(workerId).catch((error: unknown) => {
        failed = true;
        throw error;
      }),
    ),
  );

  await iterator.return?.();

  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      throw outcome.reason;
    }
  }

  return { processed, aborted: signal?.aborted ?? false };
}
