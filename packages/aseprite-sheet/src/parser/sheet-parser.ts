import { type ErrorFlags, Errors, MalformedInputException } from '@/error/errors.ts';
import { type Logger, logger as defaultLogger } from '@/logger.ts';
import type { SchemaContext } from './structure/schema-context.ts';
import { type SpritesheetData, createSpritesheetSchema } from './structure/sprite-sheet-data.ts';
import { frameList } from './structure/frame.ts';
import { describeIssue } from './issues.ts';

/**
 * Raw export contents: JSON text or its UTF-8 bytes.
 */
export type SheetInput = string | Uint8Array | ArrayBuffer;

export interface ParseOptions {
  /** Checks to enforce, `Errors.DEFAULT` when omitted */
  readonly errors?: ErrorFlags;
  readonly logger?: Logger;
}

/**
 * Decode input to text, dropping a leading byte order mark.
 */
export function decodeInput(input: SheetInput): string {
  const text = typeof input === 'string' ? input : new TextDecoder('utf-8', { fatal: true }).decode(input);
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/**
 * Parse an aseprite JSON export.
 *
 * Frames are read as an ordered list when `frames` is a JSON array and as a
 * name-keyed map when it is a JSON object. Sections missing from the input stay
 * absent in the result.
 *
 * @throws {MalformedInputException} when the input is not valid JSON or does not
 * match the export format
 */
export function parseSpriteSheet(input: SheetInput, options: ParseOptions = {}): SpritesheetData {
  const context: SchemaContext = {
    errors: options.errors ?? Errors.DEFAULT,
    logger: options.logger ?? defaultLogger,
  };

  let json: unknown;
  try {
    json = JSON.parse(decodeInput(input));
  } catch (error) {
    throw MalformedInputException.createInvalidJson(error);
  }

  const result = createSpritesheetSchema(context).safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map(describeIssue);
    context.logger.debug({ issues }, 'rejected malformed sprite sheet');
    throw MalformedInputException.createFromIssues(issues);
  }

  const data: SpritesheetData = result.data;
  context.logger.debug(
    { layout: data.frames.layout, frames: frameList(data.frames).length, image: data.meta.image },
    'parsed sprite sheet',
  );
  return data;
}
