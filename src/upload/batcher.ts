export const DEFAULT_BATCH_SIZE = 100;

/**
 * Lazily splits `items` into arrays of `size` elements, in order.
 * The last batch may be shorter. Call again to restart.
 */
export function* chunk<T>(
  items: Iterable<T>,
  size: number = DEFAULT_BATCH_SIZE,
): Generator<T[], void, undefined> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Batch size must be a positive integer, got ${size}`);
  }

  let batch: T[] = [];
  for (const item of items) {
    batch.push(item);
    if (batch.length === size) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) {
    yield batch;
  }
}
