/**
 * Bounded fan-out for per-id account reads
 * @module query/bulk
 */

import { InvalidParameterError } from '../errors.js';
import { Logger, silentLogger } from '../utils/logger.js';

/**
 * Run `fn` over `items` with at most `limit` calls in flight. Every item
 * settles on its own; results keep input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const results = new Array<PromiseSettledResult<R>>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await fn(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => worker());
  await Promise.all(workers);
  return results;
}

export interface BulkResult<T> {
  /** Number of ids attempted */
  total: number;
  /** Number that parsed successfully */
  valid: number;
  items: T[];
}

export interface BulkOptions {
  concurrency?: number;
  logger?: Logger;
  /** Used in log lines, e.g. "blog" */
  label?: string;
}

/** Widest range one bulk read may cover */
export const MAX_RANGE_SPAN = 100_000n;

/**
 * Ids in [start, end)
 */
export function idRange(start: bigint, end: bigint): bigint[] {
  if (start >= end) {
    throw new InvalidParameterError('range', `Invalid range: start ${start} >= end ${end}`);
  }
  if (end - start > MAX_RANGE_SPAN) {
    throw new InvalidParameterError('range', `Range too large: ${end - start} ids (max: ${MAX_RANGE_SPAN})`);
  }
  const ids: bigint[] = [];
  for (let id = start; id < end; id++) {
    ids.push(id);
  }
  return ids;
}

/**
 * Fetch every id; failures are logged and skipped, never fatal
 */
export async function fetchEach<T>(
  ids: readonly bigint[],
  fetchOne: (id: bigint) => Promise<T>,
  options: BulkOptions = {}
): Promise<BulkResult<T>> {
  const logger = options.logger ?? silentLogger;
  const label = options.label ?? 'item';
  const settled = await mapWithConcurrency(ids, options.concurrency ?? 4, fetchOne);

  const items: T[] = [];
  settled.forEach((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      items.push(outcome.value);
    } else {
      logger.warn(`Failed to fetch ${label} ${ids[index]}`, outcome.reason);
    }
  });

  return { total: ids.length, valid: items.length, items };
}
