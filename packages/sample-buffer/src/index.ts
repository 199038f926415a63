// ---------------------------------------------------------------------------
// @ringstream/sample-buffer — Barrel Export
// ---------------------------------------------------------------------------
// Wraparound sample buffers for streaming audio and other row data.

export type {
  DType,
  SampleArray,
  Frame,
  SampleInput,
  Shape,
  ContiguousIndexes,
  WrappedIndexes,
  IndexSet,
  IndexMapper,
  SampleBuffer,
  BufferHooks,
  LatestWindow,
} from './types.js';

// Index mapping
export { mapIndexes, wrap, indexSetSize, toIndexArray } from './index-mapper.js';

// Storage
export {
  SampleStorage,
  allocate,
  dtypeOf,
  inferDType,
  inferColumns,
  isFrame,
  toFrame,
  tailRows,
  zeroFrame,
} from './storage.js';

// Buffers
export { RingBuffer, type RingBufferOptions, type RingBufferDataOptions } from './ring-buffer.js';
export { FramingBuffer, type FramingBufferOptions } from './framing-buffer.js';

// Errors, validation, logging
export {
  InvalidArgumentError,
  OverflowError,
  assertCount,
  assertPositive,
  type FieldErrors,
} from './errors.js';
export {
  dtypeSchema,
  ringBufferOptionsSchema,
  ringBufferDataOptionsSchema,
  framingBufferOptionsSchema,
  parseOptions,
  type RingBufferSettings,
  type RingBufferDataSettings,
  type FramingBufferSettings,
} from './schemas.js';
export {
  createLogger,
  type Logger,
  type LoggerOptions,
  type LogSink,
  type LogFields,
} from './logger.js';
