import { z } from 'zod';
import { type SchemaContext, record } from './schema-context.ts';
import { type Dimensions, createDimensionsSchema, writeDimensions } from './record/rect.ts';
import { type FrameTag, createFrameTagSchema, writeFrameTag } from './record/frame-tag.ts';
import { type Layer, createLayerSchema, writeLayer } from './record/layer.ts';
import { type Slice, createSliceSchema, writeSlice } from './record/slice.ts';

/**
 * The `meta` section of an export.
 */
export interface Metadata {
  /** Producing application, e.g. `https://www.aseprite.org/` */
  readonly app: string;
  readonly version: string;
  /** Sheet image filename */
  readonly image: string;
  /** Pixel format, e.g. `RGBA8888` */
  readonly format: string;
  /** Sheet image size */
  readonly size: Dimensions;
  /** Export scale, kept as written (e.g. `"1"`) */
  readonly scale: string;
  /** Present only when tags were exported */
  readonly frameTags?: readonly FrameTag[];
  /** Present only when layers were exported */
  readonly layers?: readonly Layer[];
  /** Present only when slices were exported */
  readonly slices?: readonly Slice[];
}

export function createMetadataSchema(context: SchemaContext) {
  return record(
    {
      app: z.string(),
      version: z.string(),
      image: z.string(),
      format: z.string(),
      size: createDimensionsSchema(context),
      scale: z.string(),
      frameTags: z.optional(z.array(createFrameTagSchema(context))),
      layers: z.optional(z.array(createLayerSchema(context))),
      slices: z.optional(z.array(createSliceSchema(context))),
    },
    context,
  );
}

export function writeMetadata(meta: Metadata) {
  return {
    app: meta.app,
    version: meta.version,
    image: meta.image,
    format: meta.format,
    size: writeDimensions(meta.size),
    scale: meta.scale,
    ...(meta.frameTags !== undefined ? { frameTags: meta.frameTags.map(writeFrameTag) } : {}),
    ...(meta.layers !== undefined ? { layers: meta.layers.map(writeLayer) } : {}),
    ...(meta.slices !== undefined ? { slices: meta.slices.map(writeSlice) } : {}),
  };
}
