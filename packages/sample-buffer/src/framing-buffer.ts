// ---------------------------------------------------------------------------
// Framing Buffer — decoupled cursors for fixed-latency audio
// ---------------------------------------------------------------------------
// The write cursor may lap unread data (overrun) and the read cursor may run
// ahead of the writer (underrun). Reads always advance by the full amount and
// fill every position outside the live window with zeros.
//
// Live window: logical positions [max(0, end - maxsize), end).

import { config } from '@ringstream/config';
import type {
  BufferHooks,
  DType,
  Frame,
  IndexMapper,
  SampleBuffer,
  SampleInput,
} from './types.js';
import { mapIndexes } from './index-mapper.js';
import { SampleStorage, tailRows, toFrame, zeroFrame } from './storage.js';
import { InvalidArgumentError, assertCount, assertPositive } from './errors.js';
import {
  dtypeSchema,
  framingBufferOptionsSchema,
  parseOptions,
  type FramingBufferSettings,
} from './schemas.js';
import { createLogger, type Logger } from './logger.js';

export type FramingBufferOptions = FramingBufferSettings & BufferHooks;

/**
 * Real-time framing buffer sized in time: `maxsize = ceil(sampleRate * seconds)`.
 *
 * With a `bufferDelay`, reads return silence without consuming anything until
 * `bufferDelay` seconds of samples have been written ahead of the read cursor.
 */
export class FramingBuffer implements SampleBuffer {
  private storage: SampleStorage;
  private readonly mapIndexes: IndexMapper;
  private readonly logger: Logger;
  private startCursor = 0;
  private endCursor = 0;
  private rate: number;
  private duration: number;
  private delay: number;
  private primed: boolean;

  constructor(options: FramingBufferOptions = {}) {
    const { indexMapper, logger, ...settings } = options;
    const parsed = parseOptions(framingBufferOptionsSchema, settings);
    this.rate = parsed.sampleRate ?? config.sampleRate;
    this.duration = parsed.seconds ?? config.seconds;
    this.delay = parsed.bufferDelay ?? Math.min(config.bufferDelay, this.duration);
    if (this.delay > this.duration) {
      throw new InvalidArgumentError(
        `bufferDelay (${this.delay}s) cannot exceed the buffer length (${this.duration}s)`,
      );
    }

    this.storage = SampleStorage.allocate(
      Math.ceil(this.rate * this.duration),
      parsed.channels ?? config.columns,
      parsed.dtype ?? config.dtype,
    );
    this.mapIndexes = indexMapper ?? mapIndexes;
    this.logger = logger ?? createLogger('framing-buffer');
    this.primed = this.delaySamples === 0;
  }

  // ─── Cursors ─────────────────────────────────────────────────────────────

  get start(): number {
    return this.startCursor;
  }

  get end(): number {
    return this.endCursor;
  }

  /** Write lead over the read cursor; negative after an underrun. */
  get length(): number {
    return this.endCursor - this.startCursor;
  }

  /** `length` clamped to `[0, maxsize]`. */
  get available(): number {
    return Math.min(Math.max(this.length, 0), this.maxsize);
  }

  /** Whether the priming delay has been satisfied. */
  get canRead(): boolean {
    return this.primed;
  }

  // ─── Timing ──────────────────────────────────────────────────────────────

  get sampleRate(): number {
    return this.rate;
  }

  /** Change the rate; maxsize follows so the buffer still spans `seconds`. */
  set sampleRate(rate: number) {
    const parsed = parseOptions(framingBufferOptionsSchema, { sampleRate: rate });
    this.rate = parsed.sampleRate ?? this.rate;
    this.reallocate(Math.ceil(this.rate * this.duration), this.channels, this.dtype);
  }

  get seconds(): number {
    return this.duration;
  }

  set seconds(seconds: number) {
    const parsed = parseOptions(framingBufferOptionsSchema, { seconds });
    this.duration = parsed.seconds ?? this.duration;
    if (this.delay > this.duration) this.delay = this.duration;
    this.reallocate(Math.ceil(this.rate * this.duration), this.channels, this.dtype);
  }

  /** Seconds of data that must be written before reads return samples. */
  get bufferDelay(): number {
    return this.delay;
  }

  set bufferDelay(bufferDelay: number) {
    const parsed = parseOptions(framingBufferOptionsSchema, { bufferDelay });
    const delay = parsed.bufferDelay ?? this.delay;
    if (delay > this.duration) {
      throw new InvalidArgumentError(
        `bufferDelay (${delay}s) cannot exceed the buffer length (${this.duration}s)`,
      );
    }
    this.delay = delay;
    this.updatePrimed();
  }

  /** Priming threshold in samples. */
  get delaySamples(): number {
    return Math.ceil(this.rate * this.delay);
  }

  // ─── Shape ───────────────────────────────────────────────────────────────

  get maxsize(): number {
    return this.storage.capacity;
  }

  /** Set the size in samples directly; `seconds` is derived from it. */
  set maxsize(maxsize: number) {
    assertPositive('maxsize', maxsize);
    this.duration = maxsize / this.rate;
    if (this.delay > this.duration) this.delay = this.duration;
    this.reallocate(maxsize, this.channels, this.dtype);
  }

  get channels(): number {
    return this.storage.columns;
  }

  set channels(channels: number) {
    this.reallocate(this.maxsize, channels, this.dtype);
  }

  get columns(): number {
    return this.channels;
  }

  get dtype(): DType {
    return this.storage.dtype;
  }

  set dtype(dtype: DType) {
    this.reallocate(this.maxsize, this.channels, parseOptions(dtypeSchema, dtype));
  }

  // ─── I/O ─────────────────────────────────────────────────────────────────

  /**
   * Store rows at the write cursor, overwriting whatever is there.
   * Only the last `maxsize` rows of an oversized batch can survive, but the
   * cursor still advances by the full batch. Returns the batch size.
   */
  write(data: SampleInput): number {
    const frame = toFrame(data, this.channels, this.dtype);
    const rows = frame.rows;
    if (rows === 0) return 0;

    const capacity = this.maxsize;
    const overrun = Math.min(Math.max(this.length, 0), Math.max(this.length + rows - capacity, 0));
    if (overrun > 0) {
      this.logger.debug('overrun discarded unread rows', { rows: overrun });
    }

    const stored = tailRows(frame, capacity);
    const skipped = rows - stored.rows;
    this.storage.copyIn(this.mapIndexes(this.endCursor + skipped, stored.rows, capacity), stored.data);
    this.endCursor += rows;
    this.updatePrimed();
    return rows;
  }

  /**
   * Read `amount` rows (default: `available`) and advance the read cursor by
   * exactly that much. Positions outside the live window read as zero.
   * Before priming completes, returns zeros and consumes nothing.
   */
  read(amount?: number): Frame {
    const size = amount ?? this.available;
    assertCount('amount', size);
    const out = zeroFrame(size, this.channels, this.dtype);
    if (!this.primed) return out;

    const from = Math.max(this.startCursor, this.endCursor - this.maxsize, 0);
    const to = Math.min(this.endCursor, this.startCursor + size);
    const live = Math.max(to - from, 0);
    if (live > 0) {
      this.storage.copyOut(this.mapIndexes(from, live, this.maxsize), out.data, from - this.startCursor);
    }
    if (live < size) {
      this.logger.debug('underrun filled with zeros', { rows: size - live });
    }

    this.startCursor += size;
    return out;
  }

  /** Reset cursors, zero storage and wait on the priming delay again. */
  clear(): void {
    this.startCursor = 0;
    this.endCursor = 0;
    this.storage.zero();
    this.primed = this.delaySamples === 0;
  }

  private updatePrimed(): void {
    if (!this.primed && this.length >= this.delaySamples) this.primed = true;
  }

  /**
   * Swap in new storage. With the same channel count the newest unread live
   * rows that fit are kept, rebased to 0; a channel change starts empty.
   */
  private reallocate(maxsize: number, channels: number, dtype: DType): void {
    assertPositive('maxsize', maxsize);
    assertPositive('channels', channels);

    const next = SampleStorage.allocate(maxsize, channels, dtype);
    let kept = 0;
    if (channels === this.channels) {
      const from = Math.max(this.startCursor, this.endCursor - this.maxsize, 0);
      kept = Math.min(Math.max(this.endCursor - from, 0), maxsize);
      const newest = this.storage.readRows(
        this.mapIndexes(this.endCursor - kept, kept, this.maxsize),
      );
      next.copyIn({ kind: 'contiguous', start: 0, stop: kept }, newest.data);
    }

    this.logger.debug('storage reallocated', {
      from: [this.maxsize, this.channels],
      to: [maxsize, channels],
      dtype,
      kept,
    });
    this.storage = next;
    this.startCursor = 0;
    this.endCursor = kept;
    this.primed = this.delaySamples === 0 || this.length >= this.delaySamples;
  }
}
