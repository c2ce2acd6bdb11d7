// Main exports
export { SpriteSheet } from './sprite-sheet.ts';

// Parser exports
export { parseSpriteSheet, decodeInput, type ParseOptions, type SheetInput } from './parser/sheet-parser.ts';
export { serializeSpriteSheet, type SerializeOptions } from './parser/sheet-serializer.ts';
export { formatPath } from './parser/issues.ts';
export type { SpritesheetData } from './parser/structure/sprite-sheet-data.ts';
export type { Metadata } from './parser/structure/metadata.ts';
export type { Frame, Frames, FramesLayout, OrderedFrames, NamedFrames } from './parser/structure/frame.ts';
export { frameList, orderedFrames, namedFrames } from './parser/structure/frame.ts';

// Record exports
export type { Rect, Dimensions, Point } from './parser/structure/record/rect.ts';
export { rectContains } from './parser/structure/record/rect.ts';
export { Direction, type FrameTag, parseDirection, tagLength } from './parser/structure/record/frame-tag.ts';
export type { Layer, ImageLayer, GroupLayer, Cel } from './parser/structure/record/layer.ts';
export { isGroupLayer } from './parser/structure/record/layer.ts';
export type { Slice, SliceKey } from './parser/structure/record/slice.ts';
export { sliceKeyAt } from './parser/structure/record/slice.ts';
export { BlendMode, parseBlendMode, blendModeToCss } from './parser/structure/record/blend-mode.ts';

// Timeline exports
export { tagFrames, tagDuration } from './timeline/tag-playback.ts';

// Error exports
export {
  Errors,
  type ErrorFlags,
  type MalformedInputIssue,
  MalformedInputException,
  isMalformedInput,
} from './error/errors.ts';

// Logging
export { logger, type Logger } from './logger.ts';
