/**
 * Resize and crop geometry.
 *
 * Pure integer arithmetic: ratios are compared by cross-multiplication and
 * every derived dimension is floor-divided, so results do not depend on
 * floating point rounding of the host.
 */

import type { CropAnchor, CropRegion, Size } from './types';

function floorDiv(numerator: number, denominator: number): number {
  return Math.floor(numerator / denominator);
}

export function hasTargetSize(size: Size | undefined): size is Size {
  return Boolean(size && (size.width || size.height));
}

/**
 * Fill in a zero component of `requested` from the original aspect ratio.
 * Returns null when both components are zero (no resize requested).
 */
export function resolveAskedSize(original: Size, requested: Size): Size | null {
  if (!hasTargetSize(requested)) {
    return null;
  }

  const width = requested.width || floorDiv(original.width * requested.height, original.height);
  const height = requested.height || floorDiv(original.height * requested.width, original.width);

  return { width: Math.max(width, 1), height: Math.max(height, 1) };
}

export function anchorFraction(anchor: CropAnchor): number {
  switch (anchor) {
    case 'top':
      return 0;
    case 'bottom':
      return 1;
    default:
      return 0.5;
  }
}

/**
 * Largest window of `original` having the aspect ratio of `asked`.
 *
 * At least one side of the window equals the matching side of the original;
 * the following thumbnail step reaches the exact asked size.
 */
export function computeCropWindow(original: Size, asked: Size, anchor: CropAnchor): CropRegion {
  const { width: w, height: h } = original;
  let newWidth: number;
  let newHeight: number;

  if (w * asked.height > h * asked.width) {
    newWidth = w;
    newHeight = floorDiv(asked.height * w, asked.width);
  } else {
    newWidth = floorDiv(asked.width * h, asked.height);
    newHeight = h;
  }

  // No cropping above image size
  if (newWidth > w) {
    newHeight = floorDiv(newHeight * w, newWidth);
    newWidth = w;
  }
  if (newHeight > h) {
    newWidth = floorDiv(newWidth * h, newHeight);
    newHeight = h;
  }

  newWidth = Math.max(newWidth, 1);
  newHeight = Math.max(newHeight, 1);

  return {
    left: Math.floor((w - newWidth) * 0.5),
    top: Math.floor((h - newHeight) * anchorFraction(anchor)),
    width: newWidth,
    height: newHeight,
  };
}

/**
 * Downscale-only fit of `current` inside `bounds`, keeping the aspect ratio.
 * Returns `current` untouched when it already fits.
 */
export function computeThumbnailSize(current: Size, bounds: Size): Size {
  let { width, height } = current;

  if (width > bounds.width) {
    height = Math.max(floorDiv(height * bounds.width, width), 1);
    width = bounds.width;
  }
  if (height > bounds.height) {
    width = Math.max(floorDiv(width * bounds.height, height), 1);
    height = bounds.height;
  }

  return { width, height };
}

export function isSameSize(a: Size, b: Size): boolean {
  return a.width === b.width && a.height === b.height;
}

export function pixelCount(size: Size): number {
  return size.width * size.height;
}
