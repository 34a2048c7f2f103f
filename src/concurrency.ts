// src/concurrency.ts — Bounded worker pool for per-file work

import { availableParallelism } from "node:os";
import pLimit from "p-limit";

export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Run `task` over every item with at most `concurrency` in flight.
 * Results come back in input order regardless of completion order.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<R>,
): Promise<R[]> {
  const limit = pLimit(Math.max(1, Math.floor(concurrency)));
  return Promise.all(items.map((item) => limit(() => task(item))));
}
