/**
 * Sharp-based ImageCodec adapter
 *
 * Uses libvips via Sharp for decoding, resampling and encoding. Pixels cross
 * the port boundary as raw 8-bit interleaved buffers.
 */

import sharp, { type Metadata, type Sharp } from 'sharp';
import type { ImageCodec } from '../../core/image/ImageCodecPort';
import { DecodeError, EncodeError, describeError } from '../../core/image/errors';
import {
  DEFAULT_QUALITY,
  type Channels,
  type CropRegion,
  type DecodedImage,
  type EncodeOptions,
  type ImageFormat,
  type ImageInfo,
  type OutputFormat,
  type PixelMode,
  type ResampleFilter,
  type RgbColor,
  type Size,
} from '../../core/image/types';
import { createLogger } from '../../utils/logger';

const logger = createLogger('sharp-codec');

// The pipeline applies its own resolution guard when asked to
const INPUT_OPTIONS = { limitInputPixels: false } as const;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const PNG_COLOR_TYPE_GRAYSCALE = 0;
const PNG_COLOR_TYPE_PALETTE = 3;

export interface CodecSettings {
  /** libvips worker threads per image; 0 keeps the library default. */
  concurrency: number;
  cache: boolean;
}

let codecInitialized = false;

/**
 * Process-wide libvips setup. Runs once; later calls are no-ops.
 */
export function initImageCodec(settings: CodecSettings): void {
  if (codecInitialized) {
    return;
  }

  if (settings.concurrency > 0) {
    sharp.concurrency(settings.concurrency);
  }
  sharp.cache(settings.cache);
  codecInitialized = true;

  logger.debug('Image codec initialized', {
    concurrency: sharp.concurrency(),
    cache: settings.cache,
    libvips: sharp.versions.vips,
  });
}

/**
 * Color type and bit depth from a PNG IHDR chunk, or null for other formats.
 */
function readPngHeader(bytes: Buffer): { colorType: number; bitDepth: number } | null {
  if (bytes.length < 26 || !PNG_SIGNATURE.every((value, index) => bytes[index] === value)) {
    return null;
  }
  return { bitDepth: bytes[24], colorType: bytes[25] };
}

function toImageFormat(format: Metadata['format']): ImageFormat {
  switch (format) {
    case 'png':
    case 'jpeg':
    case 'gif':
    case 'webp':
    case 'tiff':
      return format;
    default:
      return 'other';
  }
}

function toChannels(count: number): Channels {
  if (count === 1 || count === 2 || count === 3 || count === 4) {
    return count;
  }
  throw new DecodeError(`Unsupported channel count: ${count}`);
}

function modeFromChannels(channels: Channels): PixelMode {
  switch (channels) {
    case 1:
      return 'grayscale';
    case 2:
      return 'grayscale-alpha';
    case 3:
      return 'rgb';
    case 4:
      return 'rgba';
  }
}

function detectPixelMode(metadata: Metadata, bytes: Buffer): PixelMode {
  const png = readPngHeader(bytes);

  if (metadata.format === 'gif' || png?.colorType === PNG_COLOR_TYPE_PALETTE) {
    return 'palette';
  }
  if (png?.colorType === PNG_COLOR_TYPE_GRAYSCALE && png.bitDepth === 1) {
    return 'bilevel';
  }
  if (metadata.channels === 4 && !metadata.hasAlpha) {
    // CMYK and friends are decoded to sRGB
    return 'rgb';
  }
  return modeFromChannels(toChannels(metadata.channels ?? 3));
}

function rawInput(image: DecodedImage): Sharp {
  return sharp(image.data, {
    raw: {
      width: image.width,
      height: image.height,
      channels: image.channels,
    },
  });
}

function hasAlphaBand(image: DecodedImage): boolean {
  return image.channels === 2 || image.channels === 4;
}

async function toDecodedImage(pipeline: Sharp, source: DecodedImage): Promise<DecodedImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return {
    ...source,
    data,
    width: info.width,
    height: info.height,
    channels: toChannels(info.channels),
  };
}

export class SharpImageCodec implements ImageCodec {
  private async readMetadata(bytes: Buffer): Promise<Metadata> {
    let metadata: Metadata;
    try {
      metadata = await sharp(bytes, INPUT_OPTIONS).metadata();
    } catch (error) {
      throw new DecodeError(`Cannot identify image: ${describeError(error)}`);
    }

    if (!metadata.width || !metadata.height) {
      throw new DecodeError('Invalid image dimensions', { format: metadata.format });
    }
    if (metadata.format === 'svg') {
      throw new DecodeError('Vector images are not rasterized');
    }
    return metadata;
  }

  async inspect(bytes: Buffer): Promise<ImageInfo> {
    const metadata = await this.readMetadata(bytes);

    return {
      width: metadata.width ?? 0,
      height: metadata.height ?? 0,
      format: toImageFormat(metadata.format),
      pixelMode: detectPixelMode(metadata, bytes),
    };
  }

  async decode(bytes: Buffer): Promise<DecodedImage> {
    const metadata = await this.readMetadata(bytes);
    const declaredMode = detectPixelMode(metadata, bytes);

    try {
      let pipeline = sharp(bytes, INPUT_OPTIONS);
      if (metadata.space !== 'srgb' && metadata.space !== 'b-w') {
        pipeline = pipeline.toColourspace('srgb');
      }
      // GIF frames decode with an alpha band even when nothing is transparent
      if (declaredMode === 'palette' && metadata.hasAlpha) {
        const { isOpaque } = await sharp(bytes, INPUT_OPTIONS).stats();
        if (isOpaque) {
          pipeline = pipeline.removeAlpha();
        }
      }

      const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
      const channels = toChannels(info.channels);
      const keepsDeclaredMode =
        declaredMode === 'palette' || (declaredMode === 'bilevel' && channels === 1);

      return {
        data,
        width: info.width,
        height: info.height,
        channels,
        pixelMode: keepsDeclaredMode ? declaredMode : modeFromChannels(channels),
        intrinsicFormat: toImageFormat(metadata.format),
      };
    } catch (error) {
      if (error instanceof DecodeError) {
        throw error;
      }
      throw new DecodeError(`Failed to decode image: ${describeError(error)}`, {
        format: metadata.format,
      });
    }
  }

  async crop(image: DecodedImage, region: CropRegion): Promise<DecodedImage> {
    // Clamp crop region to image bounds
    const left = Math.max(0, Math.floor(region.left));
    const top = Math.max(0, Math.floor(region.top));
    const width = Math.min(region.width, image.width - left);
    const height = Math.min(region.height, image.height - top);

    if (width <= 0 || height <= 0) {
      throw new EncodeError(`Invalid crop region: ${left},${top} ${width}x${height}`);
    }

    try {
      return await toDecodedImage(rawInput(image).extract({ left, top, width, height }), image);
    } catch (error) {
      throw new EncodeError(`Failed to crop image: ${describeError(error)}`);
    }
  }

  async resize(image: DecodedImage, size: Size, filter: ResampleFilter): Promise<DecodedImage> {
    try {
      const pipeline = rawInput(image).resize(size.width, size.height, {
        fit: 'fill',
        kernel: filter === 'nearest' ? sharp.kernel.nearest : sharp.kernel.lanczos3,
        fastShrinkOnLoad: false,
      });
      return await toDecodedImage(pipeline, image);
    } catch (error) {
      throw new EncodeError(`Failed to resize image: ${describeError(error)}`);
    }
  }

  async flatten(image: DecodedImage, background: RgbColor): Promise<DecodedImage> {
    try {
      const colour = image.channels <= 2 ? await toDecodedImage(rawInput(image).toColourspace('srgb'), image) : image;
      const flattened = await toDecodedImage(rawInput(colour).flatten({ background }).removeAlpha(), colour);
      return { ...flattened, pixelMode: 'rgb' };
    } catch (error) {
      throw new EncodeError(`Failed to flatten image: ${describeError(error)}`);
    }
  }

  async toRgb(image: DecodedImage): Promise<DecodedImage> {
    if (image.channels === 3) {
      return { ...image, pixelMode: image.pixelMode === 'palette' ? 'palette' : 'rgb' };
    }

    try {
      const converted = await toDecodedImage(rawInput(image).removeAlpha().toColourspace('srgb'), image);
      return { ...converted, pixelMode: 'rgb' };
    } catch (error) {
      throw new EncodeError(`Failed to convert image to RGB: ${describeError(error)}`);
    }
  }

  async extractAlpha(image: DecodedImage): Promise<Buffer | null> {
    if (!hasAlphaBand(image)) {
      return null;
    }

    try {
      const alphaBand = image.channels === 2 ? 1 : 3;
      return await rawInput(image).extractChannel(alphaBand).raw().toBuffer();
    } catch (error) {
      throw new EncodeError(`Failed to extract alpha: ${describeError(error)}`);
    }
  }

  async joinAlpha(image: DecodedImage, alpha: Buffer): Promise<DecodedImage> {
    const { width, height } = image;
    if (alpha.length !== width * height) {
      throw new RangeError(`Alpha has ${alpha.length} samples, image has ${width * height} pixels`);
    }

    const colour = await this.toRgb(image);
    try {
      const joined = await toDecodedImage(
        rawInput(colour).joinChannel(alpha, { raw: { width, height, channels: 1 } }),
        colour
      );
      return { ...joined, pixelMode: 'rgba' };
    } catch (error) {
      throw new EncodeError(`Failed to join alpha: ${describeError(error)}`);
    }
  }

  async encode(image: DecodedImage, format: OutputFormat, options: EncodeOptions): Promise<Buffer> {
    let pipeline = rawInput(image);

    switch (format) {
      case 'PNG':
        pipeline =
          image.pixelMode === 'palette'
            ? pipeline.png({
                palette: true,
                colours: 256,
                dither: 0,
                compressionLevel: options.optimize ? 9 : 6,
                effort: options.optimize ? 10 : 7,
              })
            : pipeline.png({
                compressionLevel: options.optimize ? 9 : 6,
                adaptiveFiltering: options.optimize,
              });
        break;
      case 'JPEG':
        pipeline = pipeline.jpeg({
          quality: options.quality ?? DEFAULT_QUALITY,
          optimizeCoding: options.optimize,
        });
        break;
      case 'GIF':
        if (image.channels <= 2) {
          pipeline = pipeline.toColourspace('srgb');
        }
        pipeline = pipeline.gif({ effort: options.optimize ? 10 : 7 });
        break;
    }

    try {
      return await pipeline.toBuffer();
    } catch (error) {
      throw new EncodeError(`Failed to encode ${format} image: ${describeError(error)}`, {
        width: image.width,
        height: image.height,
        pixelMode: image.pixelMode,
      });
    }
  }
}
