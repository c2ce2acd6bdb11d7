import { z } from 'zod';
import { type ErrorFlags, Errors, hasFlag } from '@/error/errors.ts';
import type { Logger } from '@/logger.ts';

/**
 * Settings the record schemas are built with.
 */
export interface SchemaContext {
  readonly errors: ErrorFlags;
  readonly logger: Logger;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Object schema for one JSON record.
 *
 * Fields outside `shape` are dropped, or reported when `Errors.UNKNOWN_FIELD` is set.
 * An optional field written as `null` reads as absent.
 */
export function record<T extends z.ZodRawShape>(shape: T, context: SchemaContext) {
  const known = new Set(Object.keys(shape));
  const optional = new Set(
    Object.entries(shape)
      .filter(([, field]) => field.isOptional())
      .map(([key]) => key),
  );
  const strict = hasFlag(context.errors, Errors.UNKNOWN_FIELD);

  return z.preprocess((value, ctx) => {
    if (!isPlainObject(value)) {
      return value;
    }

    if (strict) {
      for (const key of Object.keys(value)) {
        if (!known.has(key)) {
          ctx.addIssue({ code: z.ZodIssueCode.unrecognized_keys, keys: [key], path: [key] });
        }
      }
    }

    return Object.fromEntries(Object.entries(value).filter(([key, field]) => field !== null || !optional.has(key)));
  }, z.object(shape));
}
