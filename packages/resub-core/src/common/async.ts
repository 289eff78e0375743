export type MapLimitOptions<T, R> = {
  concurrency: number;
  /**
   * Called once per item, in input order, as soon as the item and everything
   * before it have finished.
   */
  onResult?: (result: R, item: T, index: number) => void;
};

// Pulls lazily from `items`; never reads ahead of a free worker.
// The first rejection stops new work and is rethrown once in-flight items settle.
export async function mapLimit<T, R>(
  items: AsyncIterable<T> | Iterable<T>,
  mapper: (item: T, index: number) => Promise<R>,
  options: MapLimitOptions<T, R>,
): Promise<R[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const out: R[] = [];

  if (concurrency === 1) {
    let index = 0;
    for await (const item of items) {
      const result = await mapper(item, index);
      out.push(result);
      options.onResult?.(result, item, index);
      index += 1;
    }
    return out;
  }

  const iterator = toAsyncIterator(items);
  const settled = new Map<number, { item: T; result: R }>();
  let nextIndex = 0;
  let nextToEmit = 0;
  let done = false;
  let failed = false;
  let firstError: unknown = null;

  function emitReady(): void {
    for (let ready = settled.get(nextToEmit); ready; ready = settled.get(nextToEmit)) {
      settled.delete(nextToEmit);
      out.push(ready.result);
      options.onResult?.(ready.result, ready.item, nextToEmit);
      nextToEmit += 1;
    }
  }

  async function worker(): Promise<void> {
    while (!done && !failed) {
      const index = nextIndex;
      nextIndex += 1;

      let step: IteratorResult<T>;
      try {
        step = await iterator.next();
      } catch (error) {
        failed = true;
        firstError = error;
        return;
      }
      if (step.done) {
        done = true;
        return;
      }

      try {
        settled.set(index, { item: step.value, result: await mapper(step.value, index) });
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
        return;
      }

      if (!failed) {
        emitReady();
      }
    }
  }

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  if (failed) {
    await iterator.return?.();
    throw firstError;
  }

  return out;
}

function toAsyncIterator<T>(items: AsyncIterable<T> | Iterable<T>): AsyncIterator<T> {
  if (isAsyncIterable(items)) {
    return items[Symbol.asyncIterator]();
  }
  const syncIterator = items[Symbol.iterator]();
  return {
    next: async () => syncIterator.next(),
  };
}

function isAsyncIterable<T>(items: AsyncIterable<T> | Iterable<T>): items is AsyncIterable<T> {
  return Symbol.asyncIterator in items;
}
