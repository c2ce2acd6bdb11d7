import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

export const FIXTURES_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'fixtures');

export function loadFixture(name: string): Buffer {
  return fs.readFileSync(path.join(FIXTURES_DIR, name));
}

/** Single 16x16 frame export, compact, in aseprite's field order. */
export const SINGLE_FRAME =
  '{"frames":[{"filename":"a.png","frame":{"x":0,"y":0,"w":16,"h":16},"rotated":false,"trimmed":false,' +
  '"spriteSourceSize":{"x":0,"y":0,"w":16,"h":16},"sourceSize":{"w":16,"h":16},"duration":100}],' +
  '"meta":{"app":"aseprite","version":"1.2","image":"a.png","format":"RGBA8888","size":{"w":16,"h":16},"scale":"1"}}';

/**
 * Build a document around the given frames and meta additions.
 */
export function sheetJson(frames: unknown, meta: Record<string, unknown> = {}): string {
  return JSON.stringify({
    frames,
    meta: {
      app: 'aseprite',
      version: '1.3',
      image: 'test.png',
      format: 'RGBA8888',
      size: { w: 32, h: 16 },
      scale: '1',
      ...meta,
    },
  });
}

export function frameJson(filename: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    filename,
    frame: { x: 0, y: 0, w: 16, h: 16 },
    rotated: false,
    trimmed: false,
    spriteSourceSize: { x: 0, y: 0, w: 16, h: 16 },
    sourceSize: { w: 16, h: 16 },
    duration: 100,
    ...overrides,
  };
}
