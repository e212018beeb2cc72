/**
 * @fileoverview Bounded fan-out helper used by bulk deletes.
 * @module src/storage/core/batching
 */

/**
 * Runs `worker` over `items` in consecutive batches of at most `batchSize`.
 * Items within a batch run concurrently; the next batch starts only after every
 * item of the current one has settled successfully. The first rejection
 * propagates and no further batches start.
 *
 * @param onBatch - Called before each batch with its zero-based index and size.
 */
export async function runInBatches<T>(
  items: readonly T[],
  batchSize: number,
  worker: (item: T) => Promise<void>,
  onBatch?: (batchIndex: number, size: number) => void,
): Promise<void> {
  for (let start = 0; start < items.length; start += batchSize) {
    const batch = items.slice(start, start + batchSize);
    onBatch?.(start / batchSize, batch.length);
    await Promise.all(batch.map((item) => worker(item)));
  }
}
