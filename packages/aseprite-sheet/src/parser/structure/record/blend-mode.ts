import { match } from 'ts-pattern';

/**
 * Layer blend modes, as written by aseprite.
 */
export enum BlendMode {
  Normal = 'normal',
  Multiply = 'multiply',
  Screen = 'screen',
  Overlay = 'overlay',
  Darken = 'darken',
  Lighten = 'lighten',
  ColorDodge = 'color_dodge',
  ColorBurn = 'color_burn',
  HardLight = 'hard_light',
  SoftLight = 'soft_light',
  Difference = 'difference',
  Exclusion = 'exclusion',
  HslHue = 'hsl_hue',
  HslSaturation = 'hsl_saturation',
  HslColor = 'hsl_color',
  HslLuminosity = 'hsl_luminosity',
  Addition = 'addition',
  Subtract = 'subtract',
  Divide = 'divide',
}

const BLEND_MODES: ReadonlyMap<string, BlendMode> = new Map(
  Object.values(BlendMode).map((mode) => [mode.replace(/_/g, ''), mode]),
);

/**
 * Parse a blend mode identifier.
 *
 * Accepts both `color_dodge` and `colorDodge` spellings. Returns null for
 * identifiers this package does not know.
 */
export function parseBlendMode(value: string): BlendMode | null {
  return BLEND_MODES.get(value.replace(/_/g, '').toLowerCase()) ?? null;
}

/**
 * Convert blend mode to CSS mix-blend-mode value.
 */
export function blendModeToCss(mode: BlendMode): string | null {
  return match(mode)
    .with(BlendMode.Normal, () => 'normal')
    .with(BlendMode.Multiply, () => 'multiply')
    .with(BlendMode.Screen, () => 'screen')
    .with(BlendMode.Overlay, () => 'overlay')
    .with(BlendMode.Darken, () => 'darken')
    .with(BlendMode.Lighten, () => 'lighten')
    .with(BlendMode.ColorDodge, () => 'color-dodge')
    .with(BlendMode.ColorBurn, () => 'color-burn')
    .with(BlendMode.HardLight, () => 'hard-light')
    .with(BlendMode.SoftLight, () => 'soft-light')
    .with(BlendMode.Difference, () => 'difference')
    .with(BlendMode.Exclusion, () => 'exclusion')
    .with(BlendMode.HslHue, () => 'hue')
    .with(BlendMode.HslSaturation, () => 'saturation')
    .with(BlendMode.HslColor, () => 'color')
    .with(BlendMode.HslLuminosity, () => 'luminosity')
    .with(BlendMode.Addition, BlendMode.Subtract, BlendMode.Divide, () => null)
    .exhaustive();
}
