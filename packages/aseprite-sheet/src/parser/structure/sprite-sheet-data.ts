import { z } from 'zod';
import { Errors, hasFlag } from '@/error/errors.ts';
import { type SchemaContext, record } from './schema-context.ts';
import { type Frames, createFramesSchema, frameList, writeFrames } from './frame.ts';
import { type Metadata, createMetadataSchema, writeMetadata } from './metadata.ts';

/**
 * Root of a parsed aseprite JSON export.
 */
export interface SpritesheetData {
  readonly frames: Frames;
  readonly meta: Metadata;
}

export function createSpritesheetSchema(context: SchemaContext) {
  const checkRanges = hasFlag(context.errors, Errors.INVALID_RANGE);

  return record(
    {
      frames: createFramesSchema(context),
      meta: createMetadataSchema(context),
    },
    context,
  ).superRefine((sheet, ctx) => {
    if (!checkRanges) return;

    const frameCount = frameList(sheet.frames).length;
    sheet.meta.frameTags?.forEach((tag, index) => {
      if (tag.from > tag.to) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['meta', 'frameTags', index, 'from'],
          message: `tag "${tag.name}" starts at frame ${tag.from} after its last frame ${tag.to}`,
        });
      }
      if (tag.to >= frameCount) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['meta', 'frameTags', index, 'to'],
          message: `tag "${tag.name}" ends at frame ${tag.to} but the sheet has ${frameCount} frames`,
        });
      }
    });
  });
}

export function writeSpritesheet(sheet: SpritesheetData) {
  return {
    frames: writeFrames(sheet.frames),
    meta: writeMetadata(sheet.meta),
  };
}
