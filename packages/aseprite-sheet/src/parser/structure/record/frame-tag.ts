import { z } from 'zod';
import { Errors, hasFlag } from '@/error/errors.ts';
import { type SchemaContext, record } from '../schema-context.ts';
import { uint32 } from './numeric.ts';

/**
 * Playback direction of a frame tag.
 */
export enum Direction {
  Forward = 'forward',
  Reverse = 'reverse',
  Pingpong = 'pingpong',
}

/**
 * Named, inclusive range of frames forming one animation.
 */
export interface FrameTag {
  readonly name: string;
  /** First frame index */
  readonly from: number;
  /** Last frame index, inclusive */
  readonly to: number;
  readonly direction: Direction;
  /** Play count, kept as written (e.g. `"2"`); absent means loop forever */
  readonly repeat?: string;
  /** User-assigned color tag, e.g. `#000000ff` */
  readonly color?: string;
  readonly data?: string;
}

const DIRECTIONS: ReadonlySet<string> = new Set<string>(Object.values(Direction));

function isDirection(value: string): value is Direction {
  return DIRECTIONS.has(value);
}

/**
 * Parse a direction string, or null when it is not one of the known values.
 */
export function parseDirection(value: string): Direction | null {
  return isDirection(value) ? value : null;
}

export function createDirectionSchema(context: SchemaContext) {
  const strict = hasFlag(context.errors, Errors.UNKNOWN_DIRECTION);

  return z.string().transform((value, ctx): Direction => {
    const direction = parseDirection(value);
    if (direction !== null) {
      return direction;
    }

    if (strict) {
      ctx.addIssue({
        code: z.ZodIssueCode.invalid_enum_value,
        options: [...DIRECTIONS],
        received: value,
        fatal: true,
      });
      return z.NEVER;
    }

    context.logger.warn({ direction: value }, 'unknown frame tag direction, reading it as forward');
    return Direction.Forward;
  });
}

export function createFrameTagSchema(context: SchemaContext) {
  return record(
    {
      name: z.string(),
      from: uint32,
      to: uint32,
      direction: createDirectionSchema(context),
      repeat: z.optional(z.string()),
      color: z.optional(z.string()),
      data: z.optional(z.string()),
    },
    context,
  );
}

export function writeFrameTag(tag: FrameTag) {
  return {
    name: tag.name,
    from: tag.from,
    to: tag.to,
    direction: tag.direction,
    ...(tag.repeat !== undefined ? { repeat: tag.repeat } : {}),
    ...(tag.color !== undefined ? { color: tag.color } : {}),
    ...(tag.data !== undefined ? { data: tag.data } : {}),
  };
}

/**
 * Number of frames a tag spans.
 */
export function tagLength(tag: FrameTag): number {
  return tag.to >= tag.from ? tag.to - tag.from + 1 : 0;
}
