/**
 * Web-safe palette quantization.
 *
 * libvips only builds adaptive palettes, so mapping onto the fixed 216-colour
 * web palette is done here over raw 8-bit interleaved samples.
 */

import type { DecodedImage } from '../core/image/types';

const WEB_PALETTE_STEP = 51;

export function hasAlpha(image: DecodedImage): boolean {
  return image.channels === 2 || image.channels === 4;
}

function rgbAt(image: DecodedImage, pixel: number): [number, number, number] {
  const offset = pixel * image.channels;
  if (image.channels <= 2) {
    const gray = image.data[offset];
    return [gray, gray, gray];
  }
  return [image.data[offset], image.data[offset + 1], image.data[offset + 2]];
}

function nearestWebLevel(value: number): number {
  const clamped = Math.min(255, Math.max(0, value));
  return Math.round(clamped / WEB_PALETTE_STEP) * WEB_PALETTE_STEP;
}

/**
 * Map onto the web-safe palette with Floyd-Steinberg error diffusion.
 * Alpha is ignored; the result is three-channel `palette` data.
 */
export function quantizeToWebPalette(image: DecodedImage): DecodedImage {
  const { width, height } = image;
  const data = Buffer.alloc(width * height * 3);

  // Diffused error in sixteenths for this row and the next, with one pixel of
  // padding on each side to absorb spill past the edges
  const rowLength = (width + 2) * 3;
  let current = new Int16Array(rowLength);
  let next = new Int16Array(rowLength);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const pixel = y * width + x;
      const rgb = rgbAt(image, pixel);

      for (let channel = 0; channel < 3; channel++) {
        const slot = (x + 1) * 3 + channel;
        const value = rgb[channel] + current[slot] / 16;
        const level = nearestWebLevel(value);
        const error = Math.round(value - level);
        data[pixel * 3 + channel] = level;

        current[slot + 3] += error * 7;
        next[slot - 3] += error * 3;
        next[slot] += error * 5;
        next[slot + 3] += error;
      }
    }

    [current, next] = [next, current];
    next.fill(0);
  }

  return { ...image, data, channels: 3, pixelMode: 'palette' };
}
