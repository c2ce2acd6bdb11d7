import { z } from 'zod';
import { type SchemaContext, record } from '../schema-context.ts';
import { uint32, uint8 } from './numeric.ts';

/**
 * Per-frame cel of a layer, exported when it carries user data.
 */
export interface Cel {
  readonly frame: number;
  readonly opacity?: number;
  readonly color?: string;
  readonly data?: string;
}

interface LayerBase {
  readonly name: string;
  /** Name of the parent group layer */
  readonly group?: string;
  /** User-assigned color tag, e.g. `#fe5b59ff` */
  readonly color?: string;
  /** User-assigned data */
  readonly data?: string;
}

/**
 * Layer holding pixels.
 */
export interface ImageLayer extends LayerBase {
  /** 0-255 */
  readonly opacity: number;
  /** Blend mode identifier; see `parseBlendMode` */
  readonly blendMode: string;
  readonly cels?: readonly Cel[];
}

/**
 * Layer grouping other layers. Exported without opacity or blend mode.
 */
export interface GroupLayer extends LayerBase {
  readonly opacity?: never;
  readonly blendMode?: never;
  readonly cels?: never;
}

export type Layer = ImageLayer | GroupLayer;

export function isGroupLayer(layer: Layer): layer is GroupLayer {
  return layer.opacity === undefined;
}

export function createCelSchema(context: SchemaContext) {
  return record(
    {
      frame: uint32,
      opacity: z.optional(uint8),
      color: z.optional(z.string()),
      data: z.optional(z.string()),
    },
    context,
  );
}

export function createLayerSchema(context: SchemaContext) {
  return record(
    {
      name: z.string(),
      group: z.optional(z.string()),
      opacity: z.optional(uint8),
      blendMode: z.optional(z.string()),
      color: z.optional(z.string()),
      data: z.optional(z.string()),
      cels: z.optional(z.array(createCelSchema(context))),
    },
    context,
  ).transform((layer, ctx): Layer => {
    const { opacity, blendMode, cels, ...base } = layer;

    // Group layers are the ones exported without opacity and blend mode
    if (opacity === undefined && blendMode === undefined) {
      if (cels !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['cels'], message: 'group layers carry no cels', fatal: true });
        return z.NEVER;
      }
      return base;
    }

    if (opacity === undefined) {
      ctx.addIssue(missingField('opacity', z.ZodParsedType.number));
      return z.NEVER;
    }
    if (blendMode === undefined) {
      ctx.addIssue(missingField('blendMode', z.ZodParsedType.string));
      return z.NEVER;
    }

    return cels === undefined ? { ...base, opacity, blendMode } : { ...base, opacity, blendMode, cels };
  });
}

function missingField(field: string, expected: z.ZodParsedType): z.IssueData {
  return {
    code: z.ZodIssueCode.invalid_type,
    expected,
    received: z.ZodParsedType.undefined,
    path: [field],
    message: 'Required',
    fatal: true,
  };
}

export function writeCel(cel: Cel) {
  return {
    frame: cel.frame,
    ...(cel.opacity !== undefined ? { opacity: cel.opacity } : {}),
    ...(cel.color !== undefined ? { color: cel.color } : {}),
    ...(cel.data !== undefined ? { data: cel.data } : {}),
  };
}

export function writeLayer(layer: Layer) {
  return {
    name: layer.name,
    ...(layer.group !== undefined ? { group: layer.group } : {}),
    ...(isGroupLayer(layer) ? {} : { opacity: layer.opacity, blendMode: layer.blendMode }),
    ...(layer.color !== undefined ? { color: layer.color } : {}),
    ...(layer.data !== undefined ? { data: layer.data } : {}),
    ...(!isGroupLayer(layer) && layer.cels !== undefined ? { cels: layer.cels.map(writeCel) } : {}),
  };
}
