import { z } from 'zod';
import { type SchemaContext, record } from '../schema-context.ts';
import { uint32 } from './numeric.ts';
import {
  type Point,
  type Rect,
  createPointSchema,
  createRectSchema,
  writePoint,
  writeRect,
} from './rect.ts';

/**
 * Slice geometry from a given frame onward.
 */
export interface SliceKey {
  readonly frame: number;
  readonly bounds: Rect;
  /** Nine-patch center */
  readonly center?: Rect;
  readonly pivot?: Point;
}

/**
 * Named region of the sprite, e.g. a hitbox.
 */
export interface Slice {
  readonly name: string;
  readonly color: string;
  readonly data?: string;
  readonly keys: readonly SliceKey[];
}

export function createSliceKeySchema(context: SchemaContext) {
  return record(
    {
      frame: uint32,
      bounds: createRectSchema(context),
      center: z.optional(createRectSchema(context)),
      pivot: z.optional(createPointSchema(context)),
    },
    context,
  );
}

export function createSliceSchema(context: SchemaContext) {
  return record(
    {
      name: z.string(),
      color: z.string(),
      data: z.optional(z.string()),
      keys: z.array(createSliceKeySchema(context)),
    },
    context,
  );
}

export function writeSliceKey(key: SliceKey) {
  return {
    frame: key.frame,
    bounds: writeRect(key.bounds),
    ...(key.center !== undefined ? { center: writeRect(key.center) } : {}),
    ...(key.pivot !== undefined ? { pivot: writePoint(key.pivot) } : {}),
  };
}

export function writeSlice(slice: Slice) {
  return {
    name: slice.name,
    color: slice.color,
    ...(slice.data !== undefined ? { data: slice.data } : {}),
    keys: slice.keys.map(writeSliceKey),
  };
}

/**
 * Key in effect on a frame: the last key starting at or before it.
 */
export function sliceKeyAt(slice: Slice, frame: number): SliceKey | undefined {
  let current: SliceKey | undefined;
  for (const key of slice.keys) {
    if (key.frame <= frame && (current === undefined || key.frame >= current.frame)) {
      current = key;
    }
  }
  return current;
}
