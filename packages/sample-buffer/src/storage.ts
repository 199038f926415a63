// ---------------------------------------------------------------------------
// Sample storage — typed-array backing store of shape [capacity, columns]
// ---------------------------------------------------------------------------

import type { DType, Frame, IndexSet, SampleArray, SampleInput } from './types.js';
import { InvalidArgumentError } from './errors.js';

/** Allocate a zeroed typed array of the given element type. */
export function allocate(dtype: DType, length: number): SampleArray {
  switch (dtype) {
    case 'float32': return new Float32Array(length);
    case 'float64': return new Float64Array(length);
    case 'int8': return new Int8Array(length);
    case 'int16': return new Int16Array(length);
    case 'int32': return new Int32Array(length);
    case 'uint8': return new Uint8Array(length);
    case 'uint16': return new Uint16Array(length);
    case 'uint32': return new Uint32Array(length);
  }
}

/** Element type of a typed array, or undefined for anything else. */
export function dtypeOf(data: unknown): DType | undefined {
  if (data instanceof Float32Array) return 'float32';
  if (data instanceof Float64Array) return 'float64';
  if (data instanceof Int8Array) return 'int8';
  if (data instanceof Int16Array) return 'int16';
  if (data instanceof Int32Array) return 'int32';
  if (data instanceof Uint8Array) return 'uint8';
  if (data instanceof Uint16Array) return 'uint16';
  if (data instanceof Uint32Array) return 'uint32';
  return undefined;
}

export function zeroFrame(rows: number, columns: number, dtype: DType): Frame {
  return { data: allocate(dtype, rows * columns), rows, columns, dtype };
}

export function isFrame(input: SampleInput): input is Frame {
  return !ArrayBuffer.isView(input) && 'rows' in input && 'columns' in input && 'data' in input;
}

function isRowArray(input: SampleInput): input is ReadonlyArray<ArrayLike<number>> {
  if (!Array.isArray(input)) return false;
  const first: unknown = input[0];
  return typeof first === 'object' && first !== null;
}

/** Shape-carrying inputs keep their element type; plain numbers have none. */
export function inferDType(input: SampleInput): DType | undefined {
  return isFrame(input) ? input.dtype : dtypeOf(input);
}

/** Column count of an input that carries one; flat arrays are a single column. */
export function inferColumns(input: SampleInput): number {
  if (isFrame(input)) return input.columns;
  if (isRowArray(input)) return input[0]?.length ?? 1;
  return 1;
}

/**
 * Normalize caller data to a Frame of `columns` columns in `dtype`.
 * Values are cast with typed-array conversion rules.
 */
export function toFrame(input: SampleInput, columns: number, dtype: DType): Frame {
  if (isFrame(input)) {
    if (input.columns !== columns) {
      throw new InvalidArgumentError(
        `could not broadcast input of shape [${input.rows}, ${input.columns}] into ${columns} columns`,
      );
    }
    if (input.data.length !== input.rows * input.columns) {
      throw new InvalidArgumentError(
        `frame data holds ${input.data.length} values, expected ${input.rows * input.columns}`,
      );
    }
    if (input.dtype === dtype) return input;
    const data = allocate(dtype, input.data.length);
    data.set(input.data);
    return { data, rows: input.rows, columns, dtype };
  }

  if (isRowArray(input)) {
    const rows = input.length;
    const data = allocate(dtype, rows * columns);
    input.forEach((row, i) => {
      if (row.length !== columns) {
        throw new InvalidArgumentError(`row ${i} has ${row.length} values, expected ${columns}`);
      }
      data.set(row, i * columns);
    });
    return { data, rows, columns, dtype };
  }

  if (input.length % columns !== 0) {
    throw new InvalidArgumentError(
      `could not broadcast ${input.length} values into rows of ${columns} columns`,
    );
  }
  const data = allocate(dtype, input.length);
  data.set(input);
  return { data, rows: input.length / columns, columns, dtype };
}

/** The trailing `rows` rows of a frame, as a view. */
export function tailRows(frame: Frame, rows: number): Frame {
  if (rows >= frame.rows) return frame;
  const data = frame.data.subarray((frame.rows - rows) * frame.columns);
  return { data, rows, columns: frame.columns, dtype: frame.dtype };
}

/**
 * Row storage owned by exactly one buffer. Never resized in place; buffers
 * allocate a new instance and migrate rows into it.
 */
export class SampleStorage {
  readonly data: SampleArray;

  private constructor(
    readonly capacity: number,
    readonly columns: number,
    readonly dtype: DType,
  ) {
    this.data = allocate(dtype, capacity * columns);
  }

  static allocate(capacity: number, columns: number, dtype: DType): SampleStorage {
    return new SampleStorage(capacity, columns, dtype);
  }

  /** Copy the addressed rows into `target`, starting at row `targetRow`. */
  copyOut(set: IndexSet, target: SampleArray, targetRow = 0): void {
    const cols = this.columns;
    if (set.kind === 'contiguous') {
      target.set(this.data.subarray(set.start * cols, set.stop * cols), targetRow * cols);
      return;
    }
    let row = targetRow;
    for (const idx of set.indexes) {
      target.set(this.data.subarray(idx * cols, (idx + 1) * cols), row * cols);
      row++;
    }
  }

  /** Copy rows of `source` (from row `sourceRow`) into the addressed rows. */
  copyIn(set: IndexSet, source: SampleArray, sourceRow = 0): void {
    const cols = this.columns;
    if (set.kind === 'contiguous') {
      const from = sourceRow * cols;
      this.data.set(source.subarray(from, from + (set.stop - set.start) * cols), set.start * cols);
      return;
    }
    let row = sourceRow;
    for (const idx of set.indexes) {
      this.data.set(source.subarray(row * cols, (row + 1) * cols), idx * cols);
      row++;
    }
  }

  /** Fresh copy of the addressed rows. */
  readRows(set: IndexSet): Frame {
    const rows = set.kind === 'contiguous' ? set.stop - set.start : set.indexes.length;
    const frame = zeroFrame(rows, this.columns, this.dtype);
    this.copyOut(set, frame.data);
    return frame;
  }

  zero(): void {
    this.data.fill(0);
  }
}
