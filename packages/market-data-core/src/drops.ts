/**
 * Drop-day classification.
 *
 * A day "drops" when its close (or low) sits at least 2% under the previous
 * close. Severity is bucketed into [2,3), [3,4), [4,5) and 5%+.
 */

import type { DropBucket, DropBuckets, DropCount } from '@pricevault/contracts';
import { toCents } from './numeric.js';

const BUCKETS_DESCENDING: readonly DropBucket[] = [5, 4, 3, 2];

/**
 * Buckets the move from `previousClose` down to `price`.
 *
 * Works in integer cents: the day falls in bucket k when
 * `(previous - price) * 100 >= k * previous`, so exact boundaries such as
 * 100.00 -> 95.00 land in 5, not 4.
 *
 * @returns The bucket, or null for rises, shallow dips and a non-positive
 *   previous close
 *
 * @example
 * ```typescript
 * classifyDrop(99, 103);  // 3  (-3.88%)
 * classifyDrop(95, 100);  // 5  (-5.00%)
 * classifyDrop(103, 104); // null (-0.96%)
 * ```
 */
export function classifyDrop(price: number, previousClose: number): DropBucket | null {
  const prev = toCents(previousClose);
  if (prev <= 0) {
    return null;
  }

  const fall = prev - toCents(price);
  if (fall <= 0) {
    return null;
  }

  for (const bucket of BUCKETS_DESCENDING) {
    if (fall * 100 >= bucket * prev) {
      return bucket;
    }
  }
  return null;
}

export function emptyDropBuckets(): DropBuckets {
  return {
    2: { close: 0, low: 0 },
    3: { close: 0, low: 0 },
    4: { close: 0, low: 0 },
    5: { close: 0, low: 0 },
  };
}

/**
 * `"close/low"`, e.g. `"1/2"`.
 */
export function formatDropCount(count: DropCount): string {
  return `${count.close}/${count.low}`;
}
