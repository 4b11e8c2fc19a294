/**
 * Domain service that groups a stream of items into fixed-size batches.
 *
 * Pure logic with no I/O. Operates as an async generator that
 * yields batches as they fill up.
 */
export class BatchSplitter<T> {
  constructor(private readonly batchSize: number) {
    if (batchSize < 1) {
      throw new Error('Batch size must be at least 1');
    }
  }

  /**
   * Split a stream of items into batches of `batchSize`.
   *
   * Yields a `{ items, batchIndex }` tuple for each full batch.
   * The final batch may contain fewer items than `batchSize`.
   */
  async *split(items: AsyncIterable<T>): AsyncIterable<{ readonly items: readonly T[]; readonly batchIndex: number }> {
    let buffer: T[] = [];
    let batchIndex = 0;

    for await (const item of items) {
      buffer.push(item);

      if (buffer.length >= this.batchSize) {
        yield { items: buffer, batchIndex };
        buffer = [];
        batchIndex++;
      }
    }

    if (buffer.length > 0) {
      yield { items: buffer, batchIndex };
    }
  }
}
