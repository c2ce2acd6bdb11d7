import { z } from 'zod';
import { type SchemaContext, record } from './schema-context.ts';
import { uint32 } from './record/numeric.ts';
import {
  type Dimensions,
  type Rect,
  createDimensionsSchema,
  createRectSchema,
  writeDimensions,
  writeRect,
} from './record/rect.ts';

/**
 * One sprite region of the sheet image.
 */
export interface Frame {
  readonly filename: string;
  /** Region within the sheet image */
  readonly frame: Rect;
  readonly rotated: boolean;
  /** Whether transparent borders were cut before packing */
  readonly trimmed: boolean;
  /** Bounds of the region within the untrimmed sprite */
  readonly spriteSourceSize: Rect;
  /** Size of the untrimmed sprite */
  readonly sourceSize: Dimensions;
  /** Display time in milliseconds */
  readonly duration: number;
}

/**
 * Frames exported as a JSON array ("json-array").
 */
export interface OrderedFrames {
  readonly layout: 'array';
  readonly entries: readonly Frame[];
}

/**
 * Frames exported as a JSON object keyed by filename ("json-hash").
 */
export interface NamedFrames {
  readonly layout: 'hash';
  readonly entries: ReadonlyMap<string, Frame>;
}

export type Frames = OrderedFrames | NamedFrames;

export type FramesLayout = Frames['layout'];

function frameFields(context: SchemaContext) {
  return {
    frame: createRectSchema(context),
    rotated: z.boolean(),
    trimmed: z.boolean(),
    spriteSourceSize: createRectSchema(context),
    sourceSize: createDimensionsSchema(context),
    duration: uint32,
  };
}

export function createFrameSchema(context: SchemaContext) {
  return record({ filename: z.string(), ...frameFields(context) }, context);
}

/**
 * Hash entries are named by their key; `filename` is optional there.
 */
export function createNamedFrameSchema(context: SchemaContext) {
  return record({ filename: z.optional(z.string()), ...frameFields(context) }, context);
}

// Fatal, so that refinements further up never see a half-built value
function forwardIssues(ctx: z.RefinementCtx, error: z.ZodError, prefix: readonly (string | number)[]): void {
  for (const issue of error.issues) {
    ctx.addIssue({ ...issue, path: [...prefix, ...issue.path], fatal: true });
  }
}

/**
 * Schema for the `frames` field, picking the layout from the JSON shape.
 */
export function createFramesSchema(context: SchemaContext) {
  const frameSchema = createFrameSchema(context);
  const namedFrameSchema = createNamedFrameSchema(context);

  return z.unknown().transform((value, ctx): Frames => {
    if (Array.isArray(value)) {
      const entries: Frame[] = [];
      let valid = true;
      value.forEach((raw: unknown, index) => {
        const result = frameSchema.safeParse(raw);
        if (result.success) {
          entries.push(result.data);
        } else {
          forwardIssues(ctx, result.error, [index]);
          valid = false;
        }
      });
      return valid ? { layout: 'array', entries } : z.NEVER;
    }

    if (typeof value === 'object' && value !== null) {
      const entries = new Map<string, Frame>();
      let valid = true;
      for (const [name, raw] of Object.entries(value)) {
        const result = namedFrameSchema.safeParse(raw);
        if (result.success) {
          const { filename, ...fields } = result.data;
          entries.set(name, { filename: filename ?? name, ...fields });
        } else {
          forwardIssues(ctx, result.error, [name]);
          valid = false;
        }
      }
      return valid ? { layout: 'hash', entries } : z.NEVER;
    }

    const received = z.getParsedType(value);
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      params: { expected: 'array or object', received },
      message: received === z.ZodParsedType.undefined ? 'missing required field' : `expected array or object, received ${received}`,
      fatal: true,
    });
    return z.NEVER;
  });
}

export function writeFrame(frame: Frame, includeFilename: boolean = true) {
  return {
    ...(includeFilename ? { filename: frame.filename } : {}),
    frame: writeRect(frame.frame),
    rotated: frame.rotated,
    trimmed: frame.trimmed,
    spriteSourceSize: writeRect(frame.spriteSourceSize),
    sourceSize: writeDimensions(frame.sourceSize),
    duration: frame.duration,
  };
}

export function writeFrames(frames: Frames) {
  if (frames.layout === 'array') {
    return frames.entries.map((frame) => writeFrame(frame));
  }

  return Object.fromEntries(
    Array.from(frames.entries, ([name, frame]) => [name, writeFrame(frame, frame.filename !== name)] as const),
  );
}

/**
 * Frames in export order, whatever the layout.
 */
export function frameList(frames: Frames): readonly Frame[] {
  return frames.layout === 'array' ? frames.entries : Array.from(frames.entries.values());
}

/**
 * Build an array-layout collection.
 */
export function orderedFrames(entries: readonly Frame[]): OrderedFrames {
  return { layout: 'array', entries };
}

/**
 * Build a hash-layout collection keyed by each frame's filename.
 */
export function namedFrames(entries: readonly Frame[]): NamedFrames {
  return { layout: 'hash', entries: new Map(entries.map((frame) => [frame.filename, frame])) };
}
