import { z } from 'zod';

/** Signed 32-bit integer (positions, pivots) */
export const int32 = z.number().int().min(-0x80000000).max(0x7fffffff);

/** Unsigned 32-bit integer (sizes, frame indices, durations) */
export const uint32 = z.number().int().min(0).max(0xffffffff);

/** Unsigned 8-bit integer (opacity) */
export const uint8 = z.number().int().min(0).max(0xff);
