// ---------------------------------------------------------------------------
// Sample storage tests
// ---------------------------------------------------------------------------
import { describe, it, expect } from 'vitest';
import {
  SampleStorage,
  allocate,
  dtypeOf,
  inferColumns,
  inferDType,
  isFrame,
  tailRows,
  toFrame,
  zeroFrame,
} from '../storage.js';
import { mapIndexes } from '../index-mapper.js';
import { InvalidArgumentError } from '../errors.js';

describe('typed array helpers', () => {
  it('allocates the array type of each dtype', () => {
    expect(allocate('float32', 3)).toBeInstanceOf(Float32Array);
    expect(allocate('float64', 3)).toBeInstanceOf(Float64Array);
    expect(allocate('int16', 3)).toBeInstanceOf(Int16Array);
    expect(allocate('uint8', 3).length).toBe(3);
  });

  it('names the dtype of a typed array', () => {
    expect(dtypeOf(new Int32Array(1))).toBe('int32');
    expect(dtypeOf(new Uint16Array(1))).toBe('uint16');
    expect(dtypeOf([1, 2])).toBeUndefined();
  });

  it('infers shape information from inputs', () => {
    expect(inferColumns([[1, 2, 3], [4, 5, 6]])).toBe(3);
    expect(inferColumns([1, 2, 3])).toBe(1);
    expect(inferColumns(zeroFrame(2, 4, 'float64'))).toBe(4);
    expect(inferDType(new Float64Array(2))).toBe('float64');
    expect(inferDType(zeroFrame(1, 1, 'int8'))).toBe('int8');
    expect(inferDType([1])).toBeUndefined();
  });

  it('tells frames from plain arrays', () => {
    expect(isFrame(zeroFrame(1, 1, 'float32'))).toBe(true);
    expect(isFrame(new Float32Array(2))).toBe(false);
    expect(isFrame([[1], [2]])).toBe(false);
  });
});

describe('toFrame', () => {
  it('reads a flat array as interleaved rows', () => {
    const frame = toFrame([1, 2, 3, 4], 2, 'float64');
    expect(frame.rows).toBe(2);
    expect(frame.columns).toBe(2);
    expect(Array.from(frame.data)).toEqual([1, 2, 3, 4]);
  });

  it('packs an array of rows', () => {
    const frame = toFrame([[1, 2], [3, 4], [5, 6]], 2, 'int32');
    expect(frame.rows).toBe(3);
    expect(frame.data).toBeInstanceOf(Int32Array);
    expect(Array.from(frame.data)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('casts a frame to the requested dtype', () => {
    const source = { data: new Float64Array([1.9, -1.9]), rows: 2, columns: 1, dtype: 'float64' as const };
    const frame = toFrame(source, 1, 'int16');
    expect(frame.dtype).toBe('int16');
    expect(Array.from(frame.data)).toEqual([1, -1]);
  });

  it('rejects inputs that do not fit the column count', () => {
    expect(() => toFrame([1, 2, 3], 2, 'float32')).toThrow(InvalidArgumentError);
    expect(() => toFrame([[1, 2], [3]], 2, 'float32')).toThrow('row 1 has 1 values, expected 2');
    expect(() => toFrame(zeroFrame(2, 3, 'float32'), 2, 'float32')).toThrow(InvalidArgumentError);
  });

  it('tailRows keeps the last rows', () => {
    const frame = toFrame([1, 2, 3, 4, 5, 6], 2, 'float32');
    const tail = tailRows(frame, 2);
    expect(tail.rows).toBe(2);
    expect(Array.from(tail.data)).toEqual([3, 4, 5, 6]);
    expect(tailRows(frame, 5)).toBe(frame);
  });
});

describe('SampleStorage', () => {
  it('copies rows in and out across the wrap boundary', () => {
    const storage = SampleStorage.allocate(4, 2, 'float32');
    const source = toFrame([[1, 2], [3, 4], [5, 6]], 2, 'float32');
    storage.copyIn(mapIndexes(3, 3, 4), source.data);

    expect(Array.from(storage.data)).toEqual([3, 4, 5, 6, 0, 0, 1, 2]);
    const out = storage.readRows(mapIndexes(3, 3, 4));
    expect(out.rows).toBe(3);
    expect(Array.from(out.data)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('copies into a target row offset', () => {
    const storage = SampleStorage.allocate(3, 1, 'float64');
    storage.copyIn(mapIndexes(0, 3, 3), new Float64Array([7, 8, 9]));
    const target = new Float64Array(5);
    storage.copyOut(mapIndexes(1, 2, 3), target, 2);
    expect(Array.from(target)).toEqual([0, 0, 8, 9, 0]);
  });

  it('zero clears every row', () => {
    const storage = SampleStorage.allocate(2, 1, 'int8');
    storage.copyIn(mapIndexes(0, 2, 2), new Int8Array([5, 6]));
    storage.zero();
    expect(Array.from(storage.data)).toEqual([0, 0]);
  });
});
