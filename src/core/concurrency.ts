/**
 * Wall-clock cut-off shared by the stages of one request.
 */
export interface Deadline {
  expired(): boolean;
}

export const NO_DEADLINE: Deadline = {
  expired: () => false,
};

/**
 * Create a deadline `timeoutMs` from now. A missing or non-finite timeout never expires.
 */
export function createDeadline(timeoutMs?: number, now: () => number = Date.now): Deadline {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs)) {
    return NO_DEADLINE;
  }
  const endsAt = now() + Math.max(0, timeoutMs);
  return {
    expired: () => now() >= endsAt,
  };
}

export interface PoolResult<R> {
  /** Results in input order; undefined where the item was never processed */
  results: Array<R | undefined>;
  /** Number of items the workers picked up */
  processed: number;
  /** The deadline stopped the pool before every item was picked up */
  interrupted: boolean;
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Each worker checks the deadline before taking the next item.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  deadline: Deadline = NO_DEADLINE
): Promise<PoolResult<R>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  const size = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let next = 0;
  let processed = 0;
  let interrupted = false;

  async function drain(): Promise<void> {
    while (next < items.length && !interrupted) {
      if (deadline.expired()) {
        interrupted = true;
        return;
      }
      const index = next++;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      processed++;
      results[index] = await worker(item, index);
    }
  }

  const workers: Array<Promise<void>> = [];
  for (let i = 0; i < size; i++) {
    workers.push(drain());
  }
  await Promise.all(workers);

  return { results, processed, interrupted };
}
