/**
 * maskframe — defaults
 *
 * Every option object in the public API falls back to these values.
 */

import type { CellType } from './types';

// ─── Loading ──────────────────────────────────────────────────────────────────

export const DEFAULT_DELIMITER = ',';
export const DEFAULT_ENCODING: BufferEncoding = 'utf8';

// ─── Rendering ────────────────────────────────────────────────────────────────

export const DEFAULT_SEPARATOR = '\t';

// ─── Conversion ───────────────────────────────────────────────────────────────

export const CELL_TYPES: readonly CellType[] = ['int', 'float', 'bool', 'string', 'bigint'];

// ─── Bitset geometry ──────────────────────────────────────────────────────────

/** Bits per Uint32Array word. Bit j lives in word j >>> WORD_SHIFT. */
export const WORD_BITS  = 32;
export const WORD_SHIFT = 5;
