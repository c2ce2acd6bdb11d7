import { parseSpriteSheet } from './parser/sheet-parser.ts';
import { type SerializeOptions, serializeSpriteSheet } from './parser/sheet-serializer.ts';
import type { SpritesheetData } from './parser/structure/sprite-sheet-data.ts';
import type { Metadata } from './parser/structure/metadata.ts';
import { type Frame, type FramesLayout, frameList } from './parser/structure/frame.ts';
import type { FrameTag } from './parser/structure/record/frame-tag.ts';
import type { Layer } from './parser/structure/record/layer.ts';
import { type Slice, type SliceKey, sliceKeyAt } from './parser/structure/record/slice.ts';
import { type Point, rectContains } from './parser/structure/record/rect.ts';
import { tagDuration, tagFrames } from './timeline/tag-playback.ts';
import { type ErrorFlags, Errors } from './error/errors.ts';

/**
 * High-level read access to a parsed sprite sheet.
 */
export class SpriteSheet {
  readonly data: SpritesheetData;
  private readonly frameIndex: Map<string, number>;
  private cachedFrames?: readonly Frame[];

  constructor(data: SpritesheetData) {
    this.data = data;

    // Build filename dictionary (first occurrence wins)
    this.frameIndex = new Map();
    this.frames.forEach((frame, index) => {
      if (!this.frameIndex.has(frame.filename)) {
        this.frameIndex.set(frame.filename, index);
      }
    });
  }

  get meta(): Metadata {
    return this.data.meta;
  }

  /**
   * Layout the frames were exported with.
   */
  get layout(): FramesLayout {
    return this.data.frames.layout;
  }

  /**
   * Frames in export order, whatever the layout.
   */
  get frames(): readonly Frame[] {
    if (this.cachedFrames) return this.cachedFrames;

    this.cachedFrames = frameList(this.data.frames);
    return this.cachedFrames;
  }

  get frameCount(): number {
    return this.frames.length;
  }

  frame(index: number): Frame | undefined {
    return this.frames[index];
  }

  frameByName(filename: string): Frame | undefined {
    const index = this.frameIndex.get(filename);
    return index === undefined ? undefined : this.frames[index];
  }

  /**
   * Frame tags, or undefined when tags were not exported.
   */
  get tags(): readonly FrameTag[] | undefined {
    return this.data.meta.frameTags;
  }

  tag(name: string): FrameTag | undefined {
    return this.tags?.find((tag) => tag.name === name);
  }

  /**
   * Layers, or undefined when layers were not exported.
   */
  get layers(): readonly Layer[] | undefined {
    return this.data.meta.layers;
  }

  layer(name: string): Layer | undefined {
    return this.layers?.find((layer) => layer.name === name);
  }

  /**
   * Slices, or undefined when slices were not exported.
   */
  get slices(): readonly Slice[] | undefined {
    return this.data.meta.slices;
  }

  slice(name: string): Slice | undefined {
    return this.slices?.find((slice) => slice.name === name);
  }

  /**
   * Frame indices of one playback cycle of a tag, limited to the frames of this sheet.
   */
  tagFrames(tag: FrameTag): number[] {
    return tagFrames(tag, this.frameCount);
  }

  /**
   * Duration of one playback cycle of a tag, in milliseconds.
   */
  tagDuration(tag: FrameTag): number {
    return tagDuration(this.frames, tag);
  }

  sliceKeyAt(slice: Slice, frame: number): SliceKey | undefined {
    return sliceKeyAt(slice, frame);
  }

  /**
   * Slices whose bounds on the given frame contain a point.
   */
  slicesAt(point: Point, frame: number): Slice[] {
    return (this.slices ?? []).filter((slice) => {
      const key = sliceKeyAt(slice, frame);
      return key !== undefined && rectContains(key.bounds, point);
    });
  }

  toJson(options: SerializeOptions = {}): string {
    return serializeSpriteSheet(this.data, options);
  }

  /**
   * Parse a sprite sheet from JSON bytes.
   */
  static fromBuffer(data: Uint8Array | ArrayBuffer, errors: ErrorFlags = Errors.DEFAULT): SpriteSheet {
    return new SpriteSheet(parseSpriteSheet(data, { errors }));
  }

  /**
   * Parse a sprite sheet from JSON text.
   */
  static fromString(text: string, errors: ErrorFlags = Errors.DEFAULT): SpriteSheet {
    return new SpriteSheet(parseSpriteSheet(text, { errors }));
  }
}
