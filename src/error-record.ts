import { z } from 'zod';
import { InvalidErrorRecordError, InvalidErrorTypeError } from './errors';

/**
 * One business-logic failure recorded by a service object.
 *
 * `message` is required; `kind` is an optional machine-readable category.
 * Any further fields are carried along untouched.
 */
export interface ServiceErrorRecord {
  message: string;
  kind?: string;
  [key: string]: unknown;
}

export const errorRecordSchema = z
  .object({
    message: z.string(),
    kind: z.string().optional(),
  })
  .passthrough();

/**
 * Runtime type name of a value, for diagnostics.
 */
export const describeType = (value: unknown): string => {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'Array';

  if (typeof value === 'object') {
    const ctor: unknown = Reflect.get(value, 'constructor');
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
  }

  return typeof value;
};

/**
 * True for plain key-value objects: not null, not an array, not a class instance.
 */
export const isErrorRecordShape = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }

  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

/**
 * Throws unless `value` is a plain object matching {@link errorRecordSchema}.
 *
 * Non-objects raise InvalidErrorTypeError; objects with a missing or
 * non-string `message` (or a non-string `kind`) raise InvalidErrorRecordError.
 */
export function assertErrorRecord(value: unknown): asserts value is ServiceErrorRecord {
  if (!isErrorRecordShape(value)) {
    throw new InvalidErrorTypeError(value, describeType(value));
  }

  const parsed = errorRecordSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidErrorRecordError(parsed.error.issues);
  }
}
