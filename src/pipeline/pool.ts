/**
 * Batched worker pool. The ResourceGovernor sizes each batch before it starts;
 * the pool size never changes mid-batch. Tasks settle independently: one
 * failed segment never cancels its siblings.
 */
import pLimit from 'p-limit';
import { createLogger } from '../utils/logger.js';
import type { ConcurrencyDecision, ResourceGovernor } from '../resources/governor.js';

const log = createLogger('pool');

/** Items per batch, as a multiple of the worker count. */
const BATCH_FACTOR = 2;

export interface BatchOptions<T, R> {
  governor: ResourceGovernor;
  /** Estimated bytes each not-yet-run item will write to disk. */
  outputBytesPerItem: number;
  /** Runs at the start of every task, before `task`. Pause is observed here. */
  checkpoint?: () => Promise<void>;
  onDecision?: (decision: ConcurrencyDecision) => void | Promise<void>;
  task: (item: T) => Promise<R>;
}

export async function runInBatches<T, R>(
  items: readonly T[],
  opts: BatchOptions<T, R>,
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = [];
  let next = 0;

  while (next < items.length) {
    const remaining = items.length - next;
    const decision = await opts.governor.decide(remaining * opts.outputBytesPerItem);
    await opts.onDecision?.(decision);

    const batch = items.slice(next, next + decision.workers * BATCH_FACTOR);
    const limit = pLimit(decision.workers);
    log.debug('Starting batch', { from: next, size: batch.length, workers: decision.workers, limitedBy: decision.limitedBy });

    const settled = await Promise.allSettled(
      batch.map((item) =>
        limit(async () => {
          await opts.checkpoint?.();
          return opts.task(item);
        }),
      ),
    );
    results.push(...settled);
    next += batch.length;
  }
  return results;
}
