/**
 * Pixel Buffer Helpers
 *
 * Allocation and clipped copying for RGB frames and opacity masks.
 */

import type { MaskFrame, PixelFrame } from '../shared/types/render';

const RGB_CHANNELS = 3;

/**
 * Allocate a black RGB frame
 */
export function createFrame(width: number, height: number): PixelFrame {
  return { width, height, data: new Uint8ClampedArray(width * height * RGB_CHANNELS) };
}

/**
 * Allocate a mask filled with `opacity`
 */
export function createMask(width: number, height: number, opacity = 0): MaskFrame {
  const data = new Float32Array(width * height);
  if (opacity !== 0) {
    data.fill(opacity);
  }
  return { width, height, data };
}

/**
 * Frame returned when no cue is active: one black pixel
 */
export function blankFrame(): PixelFrame {
  return createFrame(1, 1);
}

/**
 * Mask returned when no cue is active: one fully transparent pixel
 */
export function blankMask(): MaskFrame {
  return createMask(1, 1);
}

/**
 * Column range of `source` that lands inside `target` when placed at `x`
 */
function visibleColumns(targetWidth: number, sourceWidth: number, x: number): [from: number, to: number] {
  return [Math.max(0, -x), Math.min(sourceWidth, targetWidth - x)];
}

/**
 * Copy `source` into `target` with its top-left corner at (x, y), clipped
 */
export function blitFrame(target: PixelFrame, source: PixelFrame, x: number, y: number): void {
  const [from, to] = visibleColumns(target.width, source.width, x);
  if (from >= to) return;

  for (let row = 0; row < source.height; row++) {
    const targetRow = y + row;
    if (targetRow < 0 || targetRow >= target.height) continue;

    const sourceStart = (row * source.width + from) * RGB_CHANNELS;
    const sourceEnd = (row * source.width + to) * RGB_CHANNELS;
    const targetStart = (targetRow * target.width + x + from) * RGB_CHANNELS;
    target.data.set(source.data.subarray(sourceStart, sourceEnd), targetStart);
  }
}

/**
 * Copy `source` into `target` with its top-left corner at (x, y), clipped
 */
export function blitMask(target: MaskFrame, source: MaskFrame, x: number, y: number): void {
  const [from, to] = visibleColumns(target.width, source.width, x);
  if (from >= to) return;

  for (let row = 0; row < source.height; row++) {
    const targetRow = y + row;
    if (targetRow < 0 || targetRow >= target.height) continue;

    const sourceStart = row * source.width + from;
    const targetStart = targetRow * target.width + x + from;
    target.data.set(source.data.subarray(sourceStart, row * source.width + to), targetStart);
  }
}
