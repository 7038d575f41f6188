import type { InferenceClient } from "../inference/client.js";
import {
  processRepository,
  type PipelineOptions,
  type RepositoryOutcome,
} from "./pipeline.js";

/**
 * Runs `worker` over `items` with at most `concurrency` in progress.
 * Results keep the input order.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}.`);
  }

  const results = new Array<R>(items.length);
  let next = 0;

  const run = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await worker(item, index);
    }
  };

  await Promise.all(
    Array.from({ length: Math.min(concurrency, items.length) }, run),
  );
  return results;
}

/** Processes every repository; one failing never stops the others. */
export async function processBatch(
  roots: readonly string[],
  client: InferenceClient,
  options: PipelineOptions & { concurrency: number },
): Promise<RepositoryOutcome[]> {
  const { concurrency, ...pipeline } = options;
  return mapPool(roots, concurrency, (root) =>
    processRepository(root, client, pipeline),
  );
}
