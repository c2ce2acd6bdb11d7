import { match } from 'ts-pattern';
import { Direction, type FrameTag } from '@/parser/structure/record/frame-tag.ts';
import type { Frame } from '@/parser/structure/frame.ts';

function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i <= to; i++) {
    out.push(i);
  }
  return out;
}

/**
 * Frame indices of one playback cycle of a tag on a sheet of `frameCount` frames.
 *
 * Ping-pong plays each end once per cycle: 0..3 yields 0, 1, 2, 3, 2, 1.
 * Indices past the last frame are left out. A tag whose `from` is past its `to` yields nothing.
 */
export function tagFrames(tag: FrameTag, frameCount: number): number[] {
  const last = Math.min(tag.to, frameCount - 1);
  if (tag.from > last) {
    return [];
  }

  const forward = range(tag.from, last);

  return match(tag.direction)
    .with(Direction.Forward, () => forward)
    .with(Direction.Reverse, () => forward.reverse())
    .with(Direction.Pingpong, () => [...forward, ...range(tag.from + 1, Math.min(tag.to - 1, last)).reverse()])
    .exhaustive();
}

/**
 * Duration of one playback cycle in milliseconds.
 * Indices past the end of `frames` count as zero.
 */
export function tagDuration(frames: readonly Frame[], tag: FrameTag): number {
  let total = 0;
  for (const index of tagFrames(tag, frames.length)) {
    total += frames[index]?.duration ?? 0;
  }
  return total;
}
