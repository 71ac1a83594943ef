/**
 * Named single-writer lanes. Tasks on the same lane run one after another in
 * submission order; different lanes run concurrently. A task must not await
 * another task on its own lane, since that one is queued behind it.
 */
export type SerialQueue = {
  run<T>(lane: string, task: () => Promise<T> | T): Promise<T>;
  drain(): Promise<void>;
};

export function createSerialQueue(): SerialQueue {
  const tails = new Map<string, Promise<unknown>>();

  function run<T>(lane: string, task: () => Promise<T> | T): Promise<T> {
    const previous = tails.get(lane) ?? Promise.resolve();
    // A failed task already rejected its own caller; the lane moves on.
    const next = previous
      .catch(() => undefined)
      .then(task)
      .finally(() => {
        if (tails.get(lane) === next) {
          tails.delete(lane);
        }
      });
    tails.set(lane, next);
    return next;
  }

  async function drain() {
    await Promise.allSettled(Array.from(tails.values()));
  }

  return { run, drain };
}
