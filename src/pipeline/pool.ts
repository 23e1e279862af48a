/**
 * Bounded worker pool.
 *
 * `concurrency` lanes pull from one shared iterator, so at most that many
 * workers run at once and a slow item never holds up the others. Results
 * are returned in completion order.
 */

function isAsyncIterable<T>(items: Iterable<T> | AsyncIterable<T>): items is AsyncIterable<T> {
  return Symbol.asyncIterator in items;
}

async function* fromSync<T>(items: Iterable<T>): AsyncGenerator<T> {
  yield* items;
}

/**
 * Runs `worker` over every item with at most `concurrency` in flight.
 * A worker or iterator failure stops further pulls and rejects the pool
 * once the lanes already running have settled.
 */
export async function runPool<T, R>(
  items: Iterable<T> | AsyncIterable<T>,
  concurrency: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> {
  const iterator = (isAsyncIterable(items) ? items : fromSync(items))[Symbol.asyncIterator]();
  const results: R[] = [];
  let stopped = false;

  const lane = async (): Promise<void> => {
    while (!stopped) {
      const next = await iterator.next();
      if (next.done) {
        stopped = true;
        return;
      }
      results.push(await worker(next.value));
    }
  };

  const lanes = Array.from({ length: Math.max(1, concurrency) }, () =>
    lane().catch((err: unknown) => {
      stopped = true;
      throw err;
    }),
  );

  const settled = await Promise.allSettled(lanes);
  const failure = settled.find((result): result is PromiseRejectedResult => result.status === 'rejected');
  if (failure) {
    throw failure.reason;
  }

  return results;
}
