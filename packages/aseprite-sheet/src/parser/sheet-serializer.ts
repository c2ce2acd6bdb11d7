import { type SpritesheetData, writeSpritesheet } from './structure/sprite-sheet-data.ts';

export interface SerializeOptions {
  /** Spaces per indentation level; compact output when omitted */
  readonly indent?: number;
}

/**
 * Serialize sprite sheet data to JSON text in aseprite's field order.
 * Absent optional fields are left out.
 */
export function serializeSpriteSheet(data: SpritesheetData, options: SerializeOptions = {}): string {
  return JSON.stringify(writeSpritesheet(data), null, options.indent);
}
