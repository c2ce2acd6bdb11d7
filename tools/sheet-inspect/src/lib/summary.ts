import { type Direction, type SpriteSheet, isGroupLayer, tagLength } from "aseprite-sheet";

export interface TagSummary {
  name: string;
  direction: Direction;
  frames: number;
  /** One playback cycle, in milliseconds */
  duration: number;
}

export interface LayerSummary {
  name: string;
  group: boolean;
  parent?: string;
}

/**
 * Overview of one export.
 */
export interface SheetSummary {
  file: string;
  layout: "array" | "hash";
  image: string;
  size: string;
  scale: string;
  frames: number;
  /** Sum of all frame durations, in milliseconds */
  duration: number;
  tags?: TagSummary[];
  layers?: LayerSummary[];
  slices?: string[];
}

export function summarizeSheet(file: string, sheet: SpriteSheet): SheetSummary {
  const { meta } = sheet;

  return {
    file,
    layout: sheet.layout,
    image: meta.image,
    size: `${meta.size.w}x${meta.size.h}`,
    scale: meta.scale,
    frames: sheet.frameCount,
    duration: sheet.frames.reduce((total, frame) => total + frame.duration, 0),
    ...(sheet.tags !== undefined
      ? {
          tags: sheet.tags.map((tag) => ({
            name: tag.name,
            direction: tag.direction,
            frames: tagLength(tag),
            duration: sheet.tagDuration(tag),
          })),
        }
      : {}),
    ...(sheet.layers !== undefined
      ? {
          layers: sheet.layers.map((layer) => ({
            name: layer.name,
            group: isGroupLayer(layer),
            ...(layer.group !== undefined ? { parent: layer.group } : {}),
          })),
        }
      : {}),
    ...(sheet.slices !== undefined ? { slices: sheet.slices.map((slice) => slice.name) } : {}),
  };
}

/**
 * Render a summary as indented text lines.
 */
export function formatSummary(summary: SheetSummary): string[] {
  const lines = [
    `${summary.file}`,
    `  image: ${summary.image} (${summary.size}, scale ${summary.scale})`,
    `  frames: ${summary.frames} (${summary.layout}, ${summary.duration}ms)`,
  ];

  if (summary.tags) {
    lines.push(`  tags: ${summary.tags.length}`);
    for (const tag of summary.tags) {
      lines.push(`    ${tag.name}: ${tag.frames} ${tag.frames === 1 ? "frame" : "frames"}, ${tag.direction}, ${tag.duration}ms`);
    }
  }

  if (summary.layers) {
    lines.push(`  layers: ${summary.layers.length}`);
    for (const layer of summary.layers) {
      const kind = layer.group ? " (group)" : "";
      const parent = layer.parent !== undefined ? ` in ${layer.parent}` : "";
      lines.push(`    ${layer.name}${kind}${parent}`);
    }
  }

  if (summary.slices) {
    lines.push(`  slices: ${summary.slices.join(", ")}`);
  }

  return lines;
}
