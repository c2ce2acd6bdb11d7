import { type SchemaContext, record } from '../schema-context.ts';
import { int32, uint32 } from './numeric.ts';

/**
 * Axis-aligned rectangle in pixels.
 */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly w: number;
  readonly h: number;
}

/**
 * Width and height in pixels.
 */
export interface Dimensions {
  readonly w: number;
  readonly h: number;
}

export interface Point {
  readonly x: number;
  readonly y: number;
}

export function createRectSchema(context: SchemaContext) {
  return record({ x: int32, y: int32, w: uint32, h: uint32 }, context);
}

export function createDimensionsSchema(context: SchemaContext) {
  return record({ w: uint32, h: uint32 }, context);
}

export function createPointSchema(context: SchemaContext) {
  return record({ x: int32, y: int32 }, context);
}

export function writeRect(rect: Rect): Rect {
  return { x: rect.x, y: rect.y, w: rect.w, h: rect.h };
}

export function writeDimensions(size: Dimensions): Dimensions {
  return { w: size.w, h: size.h };
}

export function writePoint(point: Point): Point {
  return { x: point.x, y: point.y };
}

/**
 * Check whether a point lies inside a rectangle (right and bottom edges excluded).
 */
export function rectContains(rect: Rect, point: Point): boolean {
  return point.x >= rect.x && point.x < rect.x + rect.w && point.y >= rect.y && point.y < rect.y + rect.h;
}
