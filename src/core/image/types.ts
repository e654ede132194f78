/**
 * Core image types shared by the transformation pipeline and its adapters.
 */

/** Base64 text of an encoded image file. */
export type EncodedImage = string;

export type PixelMode =
  | 'bilevel'
  | 'grayscale'
  | 'grayscale-alpha'
  | 'palette'
  | 'rgb'
  | 'rgba';

export type ImageFormat = 'png' | 'jpeg' | 'gif' | 'bmp' | 'webp' | 'tiff' | 'other';

export type OutputFormat = 'PNG' | 'JPEG' | 'GIF';

export type CropAnchor = 'none' | 'center' | 'top' | 'bottom';

export type ResampleFilter = 'lanczos3' | 'nearest';

export type Channels = 1 | 2 | 3 | 4;

export interface Size {
  width: number;
  height: number;
}

export interface CropRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

/** Header-level facts about an encoded image, read without decoding pixels. */
export interface ImageInfo {
  width: number;
  height: number;
  format: ImageFormat;
  pixelMode: PixelMode;
}

/**
 * Raw raster held in memory while a single `process` call runs.
 *
 * `data` is 8-bit interleaved, `channels` samples per pixel. Palette images are
 * held expanded but keep the `palette` mode.
 */
export interface DecodedImage {
  data: Buffer;
  width: number;
  height: number;
  channels: Channels;
  pixelMode: PixelMode;
  intrinsicFormat: ImageFormat;
}

export interface EncodeOptions {
  optimize: boolean;
  quality?: number;
}

export interface ProcessOptions {
  size: Size;
  verifyResolution: boolean;
  quality: number;
  crop: CropAnchor;
  colorize: boolean;
  outputFormat?: string;
}

// Arbitrary limit fitting most resolutions: 8K at 16:10, most 4320p variants
export const IMAGE_MAX_RESOLUTION = 45_000_000;

// Display divisor of the resolution message, kept distinct from the limit
export const RESOLUTION_DISPLAY_DIVISOR = 10_000_000;

export const IMAGE_BIG_SIZE: Size = { width: 1024, height: 1024 };
export const IMAGE_LARGE_SIZE: Size = { width: 256, height: 256 };
export const IMAGE_MEDIUM_SIZE: Size = { width: 128, height: 128 };
export const IMAGE_SMALL_SIZE: Size = { width: 64, height: 64 };

export const NO_SIZE: Size = { width: 0, height: 0 };

export const DEFAULT_QUALITY = 80;
