/**
 * maskframe — bitset masks
 *
 * Row and column selections are Uint32Array bitsets. Bit j marks position j
 * of the table's rows (or header) as included.
 *
 * Bit layout:
 *   word  = j >>> 5        (Math.floor(j / 32))
 *   shift = j  &  31       (j % 32)
 *   set:   bs[word] |= (1 << shift)
 *   test:  bs[word] &  (1 << shift)
 *
 * A bitset does not know how many of its trailing bits are meaningful, so
 * every mask travels with its bit count. Bits at or beyond `size` are always
 * zero; popcount and iteration rely on that.
 *
 * Masks are built by the functions below and never written to afterwards.
 * AND/OR and every builder return a fresh Uint32Array.
 */

import { WORD_BITS, WORD_SHIFT } from './constants';
import { SizeMismatchError } from './errors';

export interface Mask {
  readonly bits: Uint32Array;
  /** Number of meaningful bits: the length of the container the mask covers. */
  readonly size: number;
}

// ── Bitset construction ───────────────────────────────────────────────────────

/**
 * Allocate a zeroed bitset large enough to hold `bitCount` bits.
 * Bit j is at word (j >>> 5), shift (j & 31).
 */
export function createBitset(bitCount: number): Uint32Array {
  return new Uint32Array(Math.ceil(bitCount / WORD_BITS));
}

/** A mask of `size` bits, all clear or all set. */
export function createMask(size: number, fill: boolean): Mask {
  const bits = createBitset(size);
  if (fill && size > 0) {
    bits.fill(0xffffffff);
    const tail = size & (WORD_BITS - 1);
    // Keep bits beyond `size` zero in the last word.
    if (tail !== 0) bits[bits.length - 1] = (1 << tail) - 1;
  }
  return { bits, size };
}

/** A mask with exactly the bits at `indices` set. Repeated indices collapse. */
export function maskFromIndices(size: number, indices: Iterable<number>): Mask {
  const bits = createBitset(size);
  for (const j of indices) {
    if (!Number.isInteger(j) || j < 0 || j >= size) {
      throw new RangeError(`maskFromIndices: index ${j} is outside [0, ${size}).`);
    }
    setBit(bits, j);
  }
  return { bits, size };
}

/** A mask from a boolean array, one bit per element. */
export function maskFromBooleans(flags: readonly boolean[]): Mask {
  const bits = createBitset(flags.length);
  flags.forEach((flag, j) => {
    if (flag) setBit(bits, j);
  });
  return { bits, size: flags.length };
}

/** Expand a mask back into one boolean per position. */
export function maskToBooleans(mask: Mask): boolean[] {
  const out = new Array<boolean>(mask.size).fill(false);
  forEachSet(mask.bits, mask.size, (j) => {
    out[j] = true;
  });
  return out;
}

// ── Bit access ────────────────────────────────────────────────────────────────

/** Set bit j in place. Only called on bitsets still under construction. */
export function setBit(bs: Uint32Array, j: number): void {
  const w = j >>> WORD_SHIFT;
  bs[w] = (bs[w] ?? 0) | (1 << (j & 31));
}

/** True when bit j is set. Bits past the end of the array read as clear. */
export function testBit(bs: Uint32Array, j: number): boolean {
  return ((bs[j >>> WORD_SHIFT] ?? 0) & (1 << (j & 31))) !== 0;
}

// ── Combination ──────────────────────────────────────────────────────────────

/**
 * Return a new mask that is the bitwise AND of `a` and `b`.
 * Both masks must cover the same number of positions.
 */
export function andMask(a: Mask, b: Mask): Mask {
  return combineWords(a, b, (x, y) => x & y, 'andMask');
}

/** Return a new mask that is the bitwise OR of `a` and `b`. */
export function orMask(a: Mask, b: Mask): Mask {
  return combineWords(a, b, (x, y) => x | y, 'orMask');
}

function combineWords(
  a:       Mask,
  b:       Mask,
  op:      (x: number, y: number) => number,
  context: string,
): Mask {
  if (a.size !== b.size) throw new SizeMismatchError(context, a.size, b.size);

  const out = a.bits.slice();
  for (let w = 0; w < out.length; w++) {
    out[w] = op(out[w] ?? 0, b.bits[w] ?? 0);
  }
  return { bits: out, size: a.size };
}

// ── Population count ─────────────────────────────────────────────────────────

/**
 * Count set bits in `bs`, considering only bits 0..(limit-1).
 * If `limit` is omitted, all bits in the array are counted.
 */
export function popcount(bs: Uint32Array, limit?: number): number {
  const effectiveLimit = limit ?? bs.length * WORD_BITS;
  const fullWords      = effectiveLimit >>> WORD_SHIFT;
  const tailBits       = effectiveLimit  &  31;

  let count = 0;

  const bulk = Math.min(fullWords, bs.length);
  for (let w = 0; w < bulk; w++) {
    count += popcountWord(bs[w] ?? 0);
  }

  if (tailBits > 0 && fullWords < bs.length) {
    const mask = (1 << tailBits) - 1;
    count += popcountWord((bs[fullWords] ?? 0) & mask);
  }

  return count;
}

/** Number of included positions in a mask. */
export function countMask(mask: Mask): number {
  return popcount(mask.bits, mask.size);
}

/** Hamming weight of a single unsigned 32-bit word (parallel bit summation). */
function popcountWord(v: number): number {
  v = v - ((v >>> 1) & 0x55555555);
  v = (v & 0x33333333) + ((v >>> 2) & 0x33333333);
  return (((v + (v >>> 4)) & 0x0f0f0f0f) * 0x01010101) >>> 24;
}

// ── Iteration ────────────────────────────────────────────────────────────────

/**
 * Invoke `fn` for each set bit j in `bs`, where j < limit, in ascending order.
 *
 * Zero words are skipped in O(1). Within a non-zero word, `word & -word`
 * isolates the lowest set bit and `Math.clz32` turns it into a position;
 * `word &= word - 1` clears it.
 */
export function forEachSet(
  bs:    Uint32Array,
  limit: number,
  fn:    (j: number) => void,
): void {
  const wordCount = Math.ceil(limit / WORD_BITS);
  const lastWord  = wordCount - 1;

  for (let w = 0; w < wordCount && w < bs.length; w++) {
    let word: number = bs[w] ?? 0;

    if (w === lastWord) {
      const tail = limit & 31;
      if (tail !== 0) word &= (1 << tail) - 1;
    }

    if (word === 0) continue;

    const base = w << WORD_SHIFT;

    while (word !== 0) {
      const lsb = word & -word;
      fn(base + 31 - Math.clz32(lsb));
      word &= word - 1;
    }
  }
}

/**
 * First set position at or after `from`, or `size` when there is none.
 * Drives the lazy masked iterators, which advance one element at a time.
 */
export function nextSet(mask: Mask, from: number): number {
  for (let j = Math.max(0, from); j < mask.size; j++) {
    const w = j >>> WORD_SHIFT;
    const word = mask.bits[w] ?? 0;
    // Whole word clear from here on: jump to the next word boundary.
    if ((word >>> (j & 31)) === 0) {
      j = ((w + 1) << WORD_SHIFT) - 1;
      continue;
    }
    if (testBit(mask.bits, j)) return j;
  }
  return mask.size;
}
