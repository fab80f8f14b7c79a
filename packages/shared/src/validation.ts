/**
 * Record construction: zod validation with every violation collected,
 * followed by a deep freeze of the result.
 */
import { z } from 'zod';
import { ValidationError, type Violation } from './errors.js';

/**
 * Accepts a value or an explicit null/absent key and yields `null` for both.
 * Never substitutes an empty or zero value.
 */
export function nullable<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value): z.output<T> | null => value ?? null);
}

export type DeepReadonly<T> = T extends readonly (infer E)[]
  ? readonly DeepReadonly<E>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export function deepFreeze<T>(value: T): DeepReadonly<T>;
export function deepFreeze(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function toViolations(error: z.ZodError): Violation[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    code: issue.code,
    message: issue.message,
  }));
}

/**
 * Validates `input` against a record schema.
 * Either every field validates or a ValidationError lists all violations.
 */
export function parseRecord<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  record: string,
): DeepReadonly<z.output<S>> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(record, toViolations(result.error));
  }
  return deepFreeze(result.data);
}

/** Ordered list of records; violation paths start with the element index. */
export function parseRecords<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  record: string,
): readonly DeepReadonly<z.output<S>>[] {
  const result = z.array(schema).safeParse(input);
  if (!result.success) {
    throw new ValidationError(`${record}[]`, toViolations(result.error));
  }
  return Object.freeze(result.data.map((item) => deepFreeze(item)));
}
