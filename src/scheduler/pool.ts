export interface OrderedRunReport {
  started: number;
  /** First error thrown by a worker; no new items start once it is set. */
  failure: unknown;
  failed: boolean;
}

/**
 * Runs `worker` over `items` with at most `limit` in flight and hands results
 * to `emit` strictly in item order: a result waits in the buffer until every
 * earlier item has been emitted. `emit` calls never overlap.
 *
 * `haltOn` lets a finished result stop the run: the result is still emitted,
 * and the error it returns becomes the report's failure.
 */
export async function runOrdered<T, R extends object>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  emit: (result: R, index: number) => Promise<void>,
  haltOn: (result: R) => unknown = () => null
): Promise<OrderedRunReport> {
  const buffered = new Map<number, R>();
  let nextToStart = 0;
  let nextToEmit = 0;
  let failed = false;
  let failure: unknown = null;
  let emitting: Promise<void> = Promise.resolve();

  const drain = async (skipGaps: boolean): Promise<void> => {
    while (nextToEmit < items.length) {
      const result = buffered.get(nextToEmit);
      if (!result) {
        if (!skipGaps) return;
        nextToEmit += 1;
        continue;
      }
      buffered.delete(nextToEmit);
      await emit(result, nextToEmit);
      nextToEmit += 1;
    }
  };

  const lane = async (): Promise<void> => {
    while (!failed && nextToStart < items.length) {
      const index = nextToStart;
      nextToStart += 1;
      try {
        const result = await worker(items[index], index);
        buffered.set(index, result);
        const halt = haltOn(result);
        if (halt && !failed) {
          failed = true;
          failure = halt;
        }
        emitting = emitting.then(() => drain(false));
        await emitting;
      } catch (error) {
        if (!failed) {
          failed = true;
          failure = error;
        }
      }
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));

  // after an abort, later items that did finish are still reported in order
  emitting = emitting.then(() => drain(true));
  await emitting;

  return { started: nextToStart, failure, failed };
}
