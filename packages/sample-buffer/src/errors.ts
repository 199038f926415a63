// ---------------------------------------------------------------------------
// Error taxonomy
// ---------------------------------------------------------------------------

/** Per-field validation messages, as produced by zod's `flatten().fieldErrors`. */
export type FieldErrors = Record<string, string[] | undefined>;

/** A malformed argument: bad shape, negative amount, non-positive capacity. */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly fields: FieldErrors = {},
  ) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

/** A strict write that does not fit in the space left in the buffer. */
export class OverflowError extends Error {
  constructor(
    public readonly requested: number,
    public readonly available: number,
  ) {
    super(`Not enough space in the buffer: ${available} rows available < ${requested} requested`);
    this.name = 'OverflowError';
  }
}

/** Throws unless `value` is a non-negative integer. */
export function assertCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/** Throws unless `value` is a positive integer. */
export function assertPositive(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${name} must be a positive integer, got ${value}`);
  }
}
