import { z } from 'zod';
import { match, P } from 'ts-pattern';
import type { MalformedInputIssue } from '@/error/errors.ts';

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * Render an issue path the way it would be written in code,
 * e.g. `frames[0].frame.x` or `frames["idle 0.ase"].duration`.
 */
export function formatPath(path: readonly (string | number)[]): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else if (IDENTIFIER.test(segment)) {
      out += out === '' ? segment : `.${segment}`;
    } else {
      out += `[${JSON.stringify(segment)}]`;
    }
  }
  return out;
}

/**
 * Convert a zod issue into a malformed input issue.
 */
export function describeIssue(issue: z.ZodIssue): MalformedInputIssue {
  const path = formatPath(issue.path);

  return match<z.ZodIssue, MalformedInputIssue>(issue)
    .with({ code: z.ZodIssueCode.invalid_type }, ({ expected, received }) => ({
      path,
      expected,
      received,
      message: received === z.ZodParsedType.undefined ? 'missing required field' : `expected ${expected}, received ${received}`,
    }))
    .with({ code: z.ZodIssueCode.invalid_enum_value }, ({ options, received }) => ({
      path,
      expected: options.join(' | '),
      received: String(received),
      message: `expected one of ${options.join(', ')}, received ${JSON.stringify(received)}`,
    }))
    .with({ code: z.ZodIssueCode.unrecognized_keys }, () => ({
      path,
      message: 'unknown field',
    }))
    .with({ code: z.ZodIssueCode.custom, params: { expected: P.string, received: P.string } }, ({ params, message }) => ({
      path,
      expected: params.expected,
      received: params.received,
      message,
    }))
    .otherwise(({ message }) => ({ path, message }));
}
