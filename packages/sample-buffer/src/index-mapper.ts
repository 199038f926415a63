// ---------------------------------------------------------------------------
// Circular index mapping
// ---------------------------------------------------------------------------
// Logical cursors grow without bound; storage holds `capacity` rows.
// A range that stays inside one lap maps to a slice (single bulk copy),
// one that crosses the boundary maps to an explicit row list.

import type { IndexMapper, IndexSet } from './types.js';
import { InvalidArgumentError } from './errors.js';

/** Non-negative remainder, also for negative logical positions. */
export function wrap(position: number, capacity: number): number {
  const r = position % capacity;
  if (r < 0) return r + capacity;
  // -0 for negative multiples of capacity
  return r === 0 ? 0 : r;
}

/**
 * Map the logical range `[start, start + length)` to physical rows.
 * Pure; safe to share between any number of readers.
 */
export const mapIndexes: IndexMapper = (start, length, capacity) => {
  if (!Number.isInteger(start)) {
    throw new InvalidArgumentError(`start must be an integer, got ${start}`);
  }
  if (!Number.isInteger(length) || length < 0) {
    throw new InvalidArgumentError(`length must be a non-negative integer, got ${length}`);
  }
  if (!Number.isInteger(capacity) || capacity <= 0) {
    throw new InvalidArgumentError(`capacity must be a positive integer, got ${capacity}`);
  }

  const first = wrap(start, capacity);
  if (first + length <= capacity) {
    return { kind: 'contiguous', start: first, stop: first + length };
  }

  const indexes = new Uint32Array(length);
  let pos = first;
  for (let i = 0; i < length; i++) {
    indexes[i] = pos;
    pos = pos + 1 === capacity ? 0 : pos + 1;
  }
  return { kind: 'wrapped', indexes };
};

/** Number of rows an IndexSet addresses. */
export function indexSetSize(set: IndexSet): number {
  return set.kind === 'contiguous' ? set.stop - set.start : set.indexes.length;
}

/** Expand an IndexSet into an explicit row list. */
export function toIndexArray(set: IndexSet): number[] {
  if (set.kind === 'wrapped') return Array.from(set.indexes);
  const out: number[] = [];
  for (let i = set.start; i < set.stop; i++) out.push(i);
  return out;
}
