// ---------------------------------------------------------------------------
// @ringstream/sample-buffer — Shared Types
// ---------------------------------------------------------------------------

import type { DTypeName } from '@ringstream/config';
import type { Logger } from './logger.js';

/** Element type of a buffer's backing storage. */
export type DType = DTypeName;

/** Typed arrays a buffer can be backed by, one per DType. */
export type SampleArray =
  | Float32Array
  | Float64Array
  | Int8Array
  | Int16Array
  | Int32Array
  | Uint8Array
  | Uint16Array
  | Uint32Array;

/**
 * A block of samples exchanged with a buffer.
 * Row-major: `data[row * columns + column]`, i.e. channels interleaved.
 */
export interface Frame {
  data: SampleArray;
  rows: number;
  columns: number;
  dtype: DType;
}

/**
 * Anything a write accepts: a Frame, a flat interleaved array whose length is
 * a multiple of the column count, or an array of rows.
 */
export type SampleInput = Frame | ArrayLike<number> | ReadonlyArray<ArrayLike<number>>;

/** `[capacity, columns]` */
export type Shape = readonly [number, number];

// ---------------------------------------------------------------------------
// Index mapping
// ---------------------------------------------------------------------------

/** Physical rows `[start, stop)` that do not cross the wrap boundary. */
export interface ContiguousIndexes {
  kind: 'contiguous';
  start: number;
  stop: number;
}

/** Explicit physical rows for a range that wraps: `(start + i) mod capacity`. */
export interface WrappedIndexes {
  kind: 'wrapped';
  indexes: Uint32Array;
}

export type IndexSet = ContiguousIndexes | WrappedIndexes;

/** Maps a logical `(start, length)` range onto a storage of `capacity` rows. */
export type IndexMapper = (start: number, length: number, capacity: number) => IndexSet;

// ---------------------------------------------------------------------------
// Buffer capability
// ---------------------------------------------------------------------------

/** The capability set both buffer variants provide. */
export interface SampleBuffer {
  /** Rows a read can currently return from real data. */
  readonly available: number;
  readonly maxsize: number;
  readonly columns: number;
  readonly dtype: DType;
  write(data: SampleInput): number;
  read(amount?: number): Frame;
  clear(): void;
}

/** Collaborators a buffer takes besides its plain settings. */
export interface BufferHooks {
  /** Alternative implementation of the index mapping contract. */
  indexMapper?: IndexMapper;
  logger?: Logger;
}

/** Result of `RingBuffer.readLast`. */
export interface LatestWindow {
  /** The window, or null when not enough data was buffered. */
  frame: Frame | null;
  /** Update steps consumed, including any that were skipped to catch up. */
  frames: number;
}
