/**
 * maskframe — masked iteration
 *
 * One traversal primitive for both dimensions of a view: included rows over
 * the table, and active cells within a row. The container is never copied;
 * each iterator reads it in place and skips positions whose mask bit is clear.
 *
 *   for (const row of masked(table.rows, rowMask)) {
 *     for (const cell of masked(row, colMask)) {
 *       ...
 *     }
 *   }
 */

import { nextSet, type Mask } from './bitset';
import { SizeMismatchError } from './errors';

/**
 * Lazy iterable over the elements of `container` whose mask bit is set.
 *
 * The length check happens here, eagerly, rather than on first iteration.
 * Each call to [Symbol.iterator]() starts a fresh pass from position 0, so the
 * same iterable can be traversed any number of times.
 */
export function masked<T>(container: readonly T[], mask: Mask): Iterable<T> {
  if (container.length !== mask.size) {
    throw new SizeMismatchError('masked', container.length, mask.size);
  }

  return {
    *[Symbol.iterator]() {
      for (let j = nextSet(mask, 0); j < mask.size; j = nextSet(mask, j + 1)) {
        yield container[j]!;
      }
    },
  };
}

/** Lazy iterable over the positions whose mask bit is set. */
export function maskedIndices(mask: Mask): Iterable<number> {
  return {
    *[Symbol.iterator]() {
      for (let j = nextSet(mask, 0); j < mask.size; j = nextSet(mask, j + 1)) {
        yield j;
      }
    },
  };
}
