import pLimit from 'p-limit';
import { describeError, ResolutionError } from '../errors.js';
import type { Logger } from '../utils/logger.js';

export const DEFAULT_CONCURRENCY = 8;

export interface ResolveOptions {
  concurrency?: number;
  /** Log and drop items that fail instead of failing the whole run. */
  skipFailures?: boolean;
  logger?: Logger;
}

type Outcome<T> = { status: 'done'; value: T } | { status: 'failed'; error: ResolutionError } | { status: 'skipped' };

/**
 * Runs `worker` over every item in a bounded pool. Without `skipFailures`
 * the earliest failure to occur stops items that have not started yet and
 * is rethrown once the running ones settle.
 */
export async function resolveAll<TItem, TResult>(
  items: TItem[],
  describe: (item: TItem) => string,
  worker: (item: TItem) => Promise<TResult>,
  options: ResolveOptions = {},
): Promise<TResult[]> {
  const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY);
  const run: { failure?: ResolutionError } = {};

  const outcomes = await Promise.all(
    items.map((item) =>
      limit(async (): Promise<Outcome<TResult>> => {
        if (run.failure) {
          return { status: 'skipped' };
        }
        try {
          return { status: 'done', value: await worker(item) };
        } catch (error) {
          const failure = new ResolutionError(describe(item), { cause: error });
          if (!options.skipFailures) {
            run.failure ??= failure;
          }
          return { status: 'failed', error: failure };
        }
      }),
    ),
  );

  if (run.failure) {
    throw run.failure;
  }

  const results: TResult[] = [];
  for (const outcome of outcomes) {
    if (outcome.status === 'done') {
      results.push(outcome.value);
    } else if (outcome.status === 'failed') {
      options.logger?.(`Skipping: ${describeError(outcome.error)}`);
    }
  }
  return results;
}
