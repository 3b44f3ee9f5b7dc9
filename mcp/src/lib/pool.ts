/**
 * Caller-owned bounded worker pool.
 *
 * Each fan-out phase creates its own pool and awaits it before the next phase
 * starts. Every task writes only its own output slot, and there is no
 * cancellation: a batch settles only once every item has settled.
 */

import { toChiefError, type Outcome } from "./errors.js";

export interface Pool {
  readonly concurrency: number;
  /** Run `task` over `items`, rejecting with the first failure once the batch has drained. */
  map<T, R>(items: readonly T[], task: (item: T, index: number) => Promise<R>): Promise<R[]>;
  /** Like `map`, but never rejects: each slot holds its own Outcome. */
  settle<T, R>(
    items: readonly T[],
    task: (item: T, index: number) => Promise<R>,
  ): Promise<Outcome<R>[]>;
}

export function createPool(concurrency: number): Pool {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Pool concurrency must be a positive integer, got ${concurrency}`);
  }

  async function settle<T, R>(
    items: readonly T[],
    task: (item: T, index: number) => Promise<R>,
  ): Promise<Outcome<R>[]> {
    const results = new Array<Outcome<R>>(items.length);
    let next = 0;

    async function worker(): Promise<void> {
      while (next < items.length) {
        const index = next++;
        try {
          results[index] = { ok: true, value: await task(items[index], index) };
        } catch (err) {
          results[index] = { ok: false, error: toChiefError(err, `task ${index}`) };
        }
      }
    }

    const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => worker());
    await Promise.all(workers);
    return results;
  }

  async function map<T, R>(
    items: readonly T[],
    task: (item: T, index: number) => Promise<R>,
  ): Promise<R[]> {
    const outcomes = await settle(items, task);
    const values: R[] = [];
    for (const outcome of outcomes) {
      if (!outcome.ok) throw outcome.error;
      values.push(outcome.value);
    }
    return values;
  }

  return { concurrency, map, settle };
}
