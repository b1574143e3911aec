/**
 * Frame geometry for overlay fitting and resolution reconciliation.
 * Pure functions; all results are whole pixels.
 */
import type { Dimensions, FillCropPlan } from './types.js';

export function sameDimensions(a: Dimensions, b: Dimensions): boolean {
  return a.width === b.width && a.height === b.height;
}

/** H.264 in yuv420p needs even dimensions; drop the odd row/column. */
export function evenFrame({ width, height }: Dimensions): Dimensions {
  return {
    width:  Math.max(2, width - (width % 2)),
    height: Math.max(2, height - (height % 2)),
  };
}

/**
 * Scale `item` down, keeping its aspect ratio, until it fits inside `frame`.
 * Items that already fit are returned unchanged; nothing is ever enlarged.
 */
export function fitWithin(item: Dimensions, frame: Dimensions): Dimensions {
  if (item.width <= frame.width && item.height <= frame.height) {
    return { width: item.width, height: item.height };
  }
  const scale = Math.min(frame.width / item.width, frame.height / item.height);
  return {
    width:  Math.max(1, Math.floor(item.width * scale)),
    height: Math.max(1, Math.floor(item.height * scale)),
  };
}

export function centerOffset(item: Dimensions, frame: Dimensions): { x: number; y: number } {
  return {
    x: Math.floor((frame.width - item.width) / 2),
    y: Math.floor((frame.height - item.height) / 2),
  };
}

/**
 * Plan a fill + center-crop from `source` to `target`: scale by the larger of
 * the two axis ratios so the target is fully covered, then crop the overscan
 * evenly from both sides. Returns null when no reconciliation is needed.
 */
export function planFillCrop(source: Dimensions, target: Dimensions): FillCropPlan | null {
  if (sameDimensions(source, target)) return null;

  const scale = Math.max(target.width / source.width, target.height / source.height);
  // Rounding can land one pixel short of the target; never scale below it.
  const scaledWidth  = Math.max(target.width,  Math.round(source.width * scale));
  const scaledHeight = Math.max(target.height, Math.round(source.height * scale));

  return {
    scaledWidth,
    scaledHeight,
    cropX:  Math.floor((scaledWidth - target.width) / 2),
    cropY:  Math.floor((scaledHeight - target.height) / 2),
    width:  target.width,
    height: target.height,
  };
}
