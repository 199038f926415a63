import { z } from 'zod';
import { InvalidArgumentError, type FieldErrors } from './errors.js';

export const dtypeSchema = z.enum([
  'float32',
  'float64',
  'int8',
  'int16',
  'int32',
  'uint8',
  'uint16',
  'uint32',
]);

export const ringBufferOptionsSchema = z.object({
  maxsize: z.number().int('maxsize must be an integer').positive('maxsize must be positive'),
  columns: z.number().int().positive().optional(),
  dtype: dtypeSchema.optional(),
});

export const ringBufferDataOptionsSchema = z.object({
  columns: z.number().int().positive().optional(),
  dtype: dtypeSchema.optional(),
});

export const framingBufferOptionsSchema = z.object({
  sampleRate: z.number().finite().positive('sampleRate must be positive').optional(),
  seconds: z.number().finite().positive('seconds must be positive').optional(),
  bufferDelay: z.number().finite().nonnegative('bufferDelay cannot be negative').optional(),
  channels: z.number().int().positive().optional(),
  dtype: dtypeSchema.optional(),
});

export type RingBufferSettings = z.infer<typeof ringBufferOptionsSchema>;
export type RingBufferDataSettings = z.infer<typeof ringBufferDataOptionsSchema>;
export type FramingBufferSettings = z.infer<typeof framingBufferOptionsSchema>;

/** Validate an options object with a zod schema. Throws InvalidArgumentError on failure. */
export function parseOptions<Out, In>(
  schema: z.ZodType<Out, z.ZodTypeDef, In>,
  input: unknown,
): Out {
  const result = schema.safeParse(input);
  if (!result.success) {
    // Same shape as zod's flatten().fieldErrors, keyed by dotted path
    const fields: FieldErrors = {};
    for (const issue of result.error.issues) {
      const key = issue.path.length > 0 ? issue.path.join('.') : 'options';
      (fields[key] ??= []).push(issue.message);
    }
    const detail = Object.entries(fields)
      .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new InvalidArgumentError(`Invalid buffer options. ${detail}`, fields);
  }
  return result.data;
}
