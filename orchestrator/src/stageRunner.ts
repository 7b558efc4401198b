import { toPipelineError, type PipelineError } from './errors.js';
import { logger } from './logger.js';
import { limitConcurrency } from './utils/concurrency.js';

export type StageOutcome<TInput, TValue> =
  | { success: true; index: number; input: TInput; value: TValue }
  | { success: false; index: number; input: TInput; error: PipelineError };

export interface RunBatchOptions {
  /** Label used in log lines, e.g. "video" or "sound". */
  stage?: string;
}

/**
 * Run `worker` once per item with at most `maxConcurrency` in flight.
 *
 * A failing item never affects its siblings: whatever it throws is turned into
 * a failure outcome at the worker boundary. The returned list has one outcome
 * per item, sorted back into input order.
 */
export async function runBatch<TInput, TValue>(
  items: readonly TInput[],
  worker: (item: TInput, index: number) => Promise<TValue>,
  maxConcurrency: number,
  options: RunBatchOptions = {}
): Promise<StageOutcome<TInput, TValue>[]> {
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    throw new RangeError('maxConcurrency must be a positive integer');
  }
  if (items.length === 0) {
    return [];
  }

  const stage = options.stage ?? 'batch';
  const workers = Math.min(maxConcurrency, items.length);
  const limit = limitConcurrency(workers);
  const completed: StageOutcome<TInput, TValue>[] = [];

  logger.info({ stage, items: items.length, workers }, 'Starting stage');

  await Promise.all(
    items.map((input, index) =>
      limit(async () => {
        const startedAt = Date.now();
        try {
          const value = await worker(input, index);
          completed.push({ success: true, index, input, value });
          logger.info({ stage, index, durationMs: Date.now() - startedAt }, 'Item completed');
        } catch (error) {
          const failure = toPipelineError(error);
          completed.push({ success: false, index, input, error: failure });
          logger.warn(
            { stage, index, code: failure.code, error: failure.message, durationMs: Date.now() - startedAt },
            'Item failed'
          );
        }
      })
    )
  );

  return completed.sort((a, b) => a.index - b.index);
}
