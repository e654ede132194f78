import type { ImageCodec, ImageProcessor, RandomColorSource } from '../core/image/ImageCodecPort';
import { ResolutionExceededError } from '../core/image/errors';
import { decodeBase64, encodeBase64, isSvgPayload, resolveOutputFormat } from '../core/image/format';
import {
  computeCropWindow,
  computeThumbnailSize,
  isSameSize,
  pixelCount,
  resolveAskedSize,
} from '../core/image/geometry';
import {
  IMAGE_MAX_RESOLUTION,
  RESOLUTION_DISPLAY_DIVISOR,
  type DecodedImage,
  type EncodedImage,
  type EncodeOptions,
  type ImageInfo,
  type OutputFormat,
  type ProcessOptions,
  type ResampleFilter,
  type Size,
} from '../core/image/types';
import { parseProcessOptions } from '../schemas/processOptions';
import { createLogger } from '../utils/logger';
import { hasAlpha, quantizeToWebPalette } from './pixels';

const logger = createLogger('image-transformer');

const ENCODABLE_MODES = new Set(['bilevel', 'grayscale', 'palette', 'rgb', 'rgba']);

export interface ImageTransformerOptions {
  codec: ImageCodec;
  colorSource: RandomColorSource;
  /** Pixel count above which `verifyResolution` rejects an image. */
  maxResolution?: number;
  /** JPEG quality used when a call does not set one. */
  defaultQuality?: number;
}

interface PreparedImage {
  image: DecodedImage;
  encodeOptions: EncodeOptions;
}

/**
 * Decode, guard, crop/resize, recolor and re-encode base64 image payloads.
 *
 * Calls share no state; any number may run concurrently.
 */
export class ImageTransformer implements ImageProcessor {
  private readonly codec: ImageCodec;
  private readonly colorSource: RandomColorSource;
  private readonly maxResolution: number;
  private readonly defaultQuality?: number;

  constructor(options: ImageTransformerOptions) {
    this.codec = options.codec;
    this.colorSource = options.colorSource;
    this.maxResolution = options.maxResolution ?? IMAGE_MAX_RESOLUTION;
    this.defaultQuality = options.defaultQuality;
  }

  get resolutionLimitMegapixels(): number {
    return this.maxResolution / RESOLUTION_DISPLAY_DIVISOR;
  }

  /**
   * Returns null for an empty source and the source itself for SVG.
   *
   * @throws DecodeError when the payload is not base64 or not an image
   * @throws ResolutionExceededError when `verifyResolution` is set and the
   *   image has more pixels than the configured maximum
   */
  async process(
    source: EncodedImage | null | undefined,
    options: Partial<ProcessOptions> = {}
  ): Promise<EncodedImage | null> {
    if (!source) {
      return null;
    }
    if (isSvgPayload(source)) {
      return source;
    }

    const settings = parseProcessOptions({ ...options, quality: options.quality ?? this.defaultQuality });
    const bytes = decodeBase64(source);
    const info = await this.codec.inspect(bytes);

    if (settings.verifyResolution) {
      this.assertResolution(info);
    }

    const format = resolveOutputFormat(settings.outputFormat, info.format);

    let image = await this.codec.decode(bytes);
    image = await this.applySize(image, settings);

    if (settings.colorize) {
      image = await this.codec.flatten(image, {
        r: this.colorSource.nextChannelValue(),
        g: this.colorSource.nextChannelValue(),
        b: this.colorSource.nextChannelValue(),
      });
    }

    const prepared = await this.prepareForFormat(image, format, settings.quality);
    const output = await this.normalizeMode(prepared.image, format);

    logger.debug('Encoding image', {
      source: { width: info.width, height: info.height, format: info.format, mode: info.pixelMode },
      output: { width: output.width, height: output.height, format, mode: output.pixelMode },
      crop: settings.crop,
      colorize: settings.colorize,
    });

    const encoded = await this.codec.encode(output, format, prepared.encodeOptions);
    return encodeBase64(encoded);
  }

  /**
   * Header facts of a raster payload.
   */
  async inspect(source: EncodedImage): Promise<ImageInfo> {
    return this.codec.inspect(decodeBase64(source));
  }

  private assertResolution(info: ImageInfo): void {
    if (pixelCount(info) <= this.maxResolution) {
      return;
    }

    logger.warn('Image resolution above limit', {
      width: info.width,
      height: info.height,
      maxResolution: this.maxResolution,
    });
    throw new ResolutionExceededError(this.resolutionLimitMegapixels, info.width, info.height);
  }

  private async applySize(image: DecodedImage, settings: ProcessOptions): Promise<DecodedImage> {
    const asked = resolveAskedSize(image, settings.size);
    if (!asked) {
      return image;
    }

    let current = image;
    if (settings.crop !== 'none') {
      const region = computeCropWindow(current, asked, settings.crop);
      if (!isSameSize(region, current)) {
        current = await this.codec.crop(current, region);
      }
    }

    const target: Size = computeThumbnailSize(current, asked);
    if (isSameSize(target, current)) {
      return current;
    }
    return this.codec.resize(current, target, this.filterFor(current));
  }

  // Palette and bilevel data keep their exact values
  private filterFor(image: DecodedImage): ResampleFilter {
    return image.pixelMode === 'palette' || image.pixelMode === 'bilevel' ? 'nearest' : 'lanczos3';
  }

  private async prepareForFormat(image: DecodedImage, format: OutputFormat, quality: number): Promise<PreparedImage> {
    switch (format) {
      case 'PNG': {
        const alpha = await this.codec.extractAlpha(image);
        let paletted = image.pixelMode === 'palette' ? image : quantizeToWebPalette(image);
        if (alpha) {
          paletted = await this.codec.joinAlpha(paletted, alpha);
        }
        return { image: paletted, encodeOptions: { optimize: true } };
      }
      case 'JPEG':
        return { image, encodeOptions: { optimize: true, quality } };
      case 'GIF':
        return { image, encodeOptions: { optimize: true } };
    }
  }

  // JPEG carries no alpha channel
  private async normalizeMode(image: DecodedImage, format: OutputFormat): Promise<DecodedImage> {
    if (!ENCODABLE_MODES.has(image.pixelMode) || (format === 'JPEG' && hasAlpha(image))) {
      return this.codec.toRgb(image);
    }
    return image;
  }
}
