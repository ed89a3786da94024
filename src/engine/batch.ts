import { log, formatError } from './logger';

/**
 * Generic retry strategy: on failure, split the batch in half and retry each half.
 * Recurses until individual items, then logs and skips the failing item.
 *
 * @param items      - The batch to write
 * @param writeFn    - The actual write function (format-specific)
 * @param itemLabel  - A function to produce a log-friendly label for a single item (e.g. "row id=123")
 */
export const writeWithRetry = async <T>(
  items: T[],
  writeFn: (batch: T[]) => Promise<number>,
  itemLabel: (item: T) => string
): Promise<number> => {
  if (items.length === 0) {
    return 0;
  }

  try {
    return await writeFn(items);
  } catch (err) {
    if (items.length === 1) {
      log.warn(`Skipping ${itemLabel(items[0])}\n${formatError(err)}`);
      return 0;
    }

    const mid = Math.ceil(items.length / 2);
    const left = items.slice(0, mid);
    const right = items.slice(mid);

    log.warn(`Batch of ${items.length} failed, splitting into ${left.length} + ${right.length}`);

    // Sequential: both halves may share one connection or transaction
    const leftCount = await writeWithRetry(left, writeFn, itemLabel);
    const rightCount = await writeWithRetry(right, writeFn, itemLabel);

    return leftCount + rightCount;
  }
};
