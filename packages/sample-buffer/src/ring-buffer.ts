// ---------------------------------------------------------------------------
// Ring Buffer — bounded read/write cursors over wraparound storage
// ---------------------------------------------------------------------------
// Cursors are logical and only grow; physical row = cursor mod maxsize.
// The write cursor never leads the read cursor by more than maxsize.

import { config } from '@ringstream/config';
import type {
  BufferHooks,
  DType,
  Frame,
  IndexMapper,
  LatestWindow,
  SampleBuffer,
  SampleInput,
  Shape,
} from './types.js';
import { mapIndexes } from './index-mapper.js';
import {
  SampleStorage,
  inferColumns,
  inferDType,
  tailRows,
  toFrame,
  zeroFrame,
} from './storage.js';
import { OverflowError, assertCount, assertPositive } from './errors.js';
import {
  dtypeSchema,
  parseOptions,
  ringBufferDataOptionsSchema,
  ringBufferOptionsSchema,
  type RingBufferDataSettings,
  type RingBufferSettings,
} from './schemas.js';
import { createLogger, type Logger } from './logger.js';

export type RingBufferOptions = RingBufferSettings & BufferHooks;
export type RingBufferDataOptions = RingBufferDataSettings & BufferHooks;

/**
 * Circular buffer of `[maxsize, columns]` samples with a strict cursor
 * discipline: `0 <= end - start <= maxsize` at all times.
 *
 * Reads always return copies, so later writes cannot change returned data.
 */
export class RingBuffer implements SampleBuffer {
  private storage: SampleStorage;
  private readonly mapIndexes: IndexMapper;
  private readonly logger: Logger;
  private startCursor = 0;
  private endCursor = 0;

  constructor(options: RingBufferOptions) {
    const { indexMapper, logger, ...settings } = options;
    const parsed = parseOptions(ringBufferOptionsSchema, settings);
    this.storage = SampleStorage.allocate(
      parsed.maxsize,
      parsed.columns ?? config.columns,
      parsed.dtype ?? config.dtype,
    );
    this.mapIndexes = indexMapper ?? mapIndexes;
    this.logger = logger ?? createLogger('ring-buffer');
  }

  /**
   * Unbuffered construction: the buffer takes its shape and dtype from
   * `data`, which is immediately readable.
   */
  static fromData(data: SampleInput, options: RingBufferDataOptions = {}): RingBuffer {
    const { indexMapper, logger, ...settings } = options;
    const parsed = parseOptions(ringBufferDataOptionsSchema, settings);
    const columns = parsed.columns ?? inferColumns(data);
    const dtype = parsed.dtype ?? inferDType(data) ?? config.dtype;
    const frame = toFrame(data, columns, dtype);
    const buffer = new RingBuffer({
      maxsize: Math.max(frame.rows, 1),
      columns,
      dtype,
      indexMapper,
      logger,
    });
    buffer.commit(frame, true);
    return buffer;
  }

  // ─── Cursors & shape ─────────────────────────────────────────────────────

  /** Logical read cursor. */
  get start(): number {
    return this.startCursor;
  }

  /** Logical write cursor. */
  get end(): number {
    return this.endCursor;
  }

  /** Rows buffered and not yet consumed. */
  get length(): number {
    return this.endCursor - this.startCursor;
  }

  get available(): number {
    return this.length;
  }

  get maxsize(): number {
    return this.storage.capacity;
  }

  /** Resize, keeping the newest rows that fit. */
  set maxsize(maxsize: number) {
    this.reallocate(maxsize, this.columns, this.dtype);
  }

  get columns(): number {
    return this.storage.columns;
  }

  set columns(columns: number) {
    this.reallocate(this.maxsize, columns, this.dtype);
  }

  get shape(): Shape {
    return [this.maxsize, this.columns];
  }

  set shape(shape: Shape) {
    this.reallocate(shape[0], shape[1], this.dtype);
  }

  get dtype(): DType {
    return this.storage.dtype;
  }

  /** Cast the buffered samples to a new element type. */
  set dtype(dtype: DType) {
    this.reallocate(this.maxsize, this.columns, parseOptions(dtypeSchema, dtype));
  }

  getAvailableSpace(): number {
    return this.maxsize - this.length;
  }

  // ─── Writes ──────────────────────────────────────────────────────────────

  /**
   * Append rows at the write cursor. Returns the number of rows stored.
   *
   * With `errorOnOverflow` false, a batch larger than maxsize keeps only its
   * last maxsize rows, and the oldest buffered rows are dropped to make room.
   *
   * @throws OverflowError in strict mode when the rows do not fit
   */
  write(data: SampleInput, errorOnOverflow = true): number {
    return this.commit(toFrame(data, this.columns, this.dtype), errorOnOverflow);
  }

  /** Write, first growing maxsize to exactly `length + rows` if needed. */
  expandingWrite(data: SampleInput, errorOnOverflow = true): number {
    const frame = toFrame(data, this.columns, this.dtype);
    this.ensureSpace(frame.rows);
    return this.commit(frame, errorOnOverflow);
  }

  /** Write, first growing maxsize by the missing space only. Never loses data. */
  growingWrite(data: SampleInput): number {
    const frame = toFrame(data, this.columns, this.dtype);
    this.ensureSpace(frame.rows);
    return this.commit(frame, true);
  }

  /** Grow to exactly `length + rows` when the free space falls short. */
  private ensureSpace(rows: number): void {
    if (rows > this.getAvailableSpace()) {
      this.reallocate(this.length + rows, this.columns, this.dtype);
    }
  }

  private commit(frame: Frame, strict: boolean): number {
    const capacity = this.maxsize;
    const space = capacity - this.length;
    let rows = frame;

    if (frame.rows > space) {
      if (strict) {
        this.logger.debug('write rejected', { requested: frame.rows, available: space });
        throw new OverflowError(frame.rows, space);
      }
      rows = tailRows(frame, capacity);
      const evicted = rows.rows - space;
      this.startCursor += evicted;
      this.logger.debug('overflow dropped rows', {
        droppedIncoming: frame.rows - rows.rows,
        droppedBuffered: evicted,
      });
    }

    this.storage.copyIn(this.mapIndexes(this.endCursor, rows.rows, capacity), rows.data);
    this.endCursor += rows.rows;
    return rows.rows;
  }

  // ─── Reads ───────────────────────────────────────────────────────────────

  private take(amount: number): Frame {
    return this.storage.readRows(this.mapIndexes(this.startCursor, amount, this.maxsize));
  }

  private empty(): Frame {
    return zeroFrame(0, this.columns, this.dtype);
  }

  /**
   * Consume `amount` rows (default: everything buffered).
   * Returns an empty frame, without consuming, when fewer rows are buffered.
   */
  read(amount?: number): Frame {
    const size = amount ?? this.length;
    assertCount('amount', size);
    if (size === 0 || size > this.length) return this.empty();

    const frame = this.take(size);
    this.startCursor += size;
    return frame;
  }

  /** Like `read`, but returns whatever is buffered when `amount` exceeds it. */
  readRemaining(amount?: number): Frame {
    const requested = amount ?? this.length;
    assertCount('amount', requested);
    const size = Math.min(requested, this.length);
    if (size === 0) return this.empty();

    const frame = this.take(size);
    this.startCursor += size;
    return frame;
  }

  /**
   * Return `amount` rows but advance the read cursor by `increment` only.
   * `increment < amount` yields overlapping windows; `increment > amount`
   * skips rows. Both are clamped to what is buffered.
   */
  readOverlap(amount?: number, increment?: number): Frame {
    const requested = amount ?? this.length;
    assertCount('amount', requested);
    const size = Math.min(requested, this.length);
    const step = increment ?? size;
    assertCount('increment', step);
    if (size === 0) return this.empty();

    const frame = this.take(size);
    this.startCursor += Math.min(step, this.length);
    return frame;
  }

  /**
   * Read the newest complete window for spectral updates.
   *
   * Whole `updateRate` steps that fall behind the newest `amount` rows are
   * skipped, then one window is returned and the cursor advances one step.
   */
  readLast(amount?: number, updateRate?: number): LatestWindow {
    const size = amount ?? this.length;
    assertCount('amount', size);
    if (updateRate !== undefined) assertPositive('updateRate', updateRate);
    if (size === 0 || size > this.length) return { frame: null, frames: 0 };
    const step = updateRate ?? size;

    const skips = Math.floor((this.length - size) / step);
    this.startCursor += skips * step;
    const frame = this.take(size);
    this.startCursor += Math.min(step, this.length);
    return { frame, frames: skips + 1 };
  }

  /** Copy of everything buffered; cursors are left alone. */
  getData(): Frame {
    return this.take(this.length);
  }

  // ─── Whole-buffer operations ─────────────────────────────────────────────

  /** Reset both cursors. Storage is not zeroed; it is unreachable. */
  clear(): void {
    this.startCursor = 0;
    this.endCursor = 0;
  }

  /** Replace storage with `data`'s shape and dtype; all of it becomes readable. */
  setData(data: SampleInput): void {
    const columns = inferColumns(data);
    const dtype = inferDType(data) ?? this.dtype;
    const frame = toFrame(data, columns, dtype);
    this.storage = SampleStorage.allocate(Math.max(frame.rows, 1), columns, dtype);
    this.clear();
    this.commit(frame, true);
    this.logger.debug('storage replaced', { shape: [this.maxsize, columns], dtype });
  }

  /**
   * Swap in new storage and migrate the buffered rows, rebased to 0.
   * Same columns: the newest rows that fit are kept. New columns: the buffered
   * values are reinterpreted row-major when they divide evenly and fit,
   * otherwise the buffer starts empty.
   */
  private reallocate(maxsize: number, columns: number, dtype: DType): void {
    assertPositive('maxsize', maxsize);
    assertPositive('columns', columns);

    const next = SampleStorage.allocate(maxsize, columns, dtype);
    let kept = 0;

    if (columns === this.columns) {
      kept = Math.min(this.length, maxsize);
      const newest = this.storage.readRows(
        this.mapIndexes(this.endCursor - kept, kept, this.maxsize),
      );
      next.copyIn({ kind: 'contiguous', start: 0, stop: kept }, newest.data);
    } else {
      const values = this.length * this.columns;
      if (values % columns === 0 && values / columns <= maxsize) {
        kept = values / columns;
        next.data.set(this.getData().data);
      }
    }

    this.logger.debug('storage reallocated', {
      from: [this.maxsize, this.columns],
      to: [maxsize, columns],
      dtype,
      kept,
    });
    this.storage = next;
    this.startCursor = 0;
    this.endCursor = kept;
  }
}
