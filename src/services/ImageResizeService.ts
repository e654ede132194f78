import type { ImageProcessor } from '../core/image/ImageCodecPort';
import { isSvgPayload } from '../core/image/format';
import {
  DEFAULT_QUALITY,
  IMAGE_BIG_SIZE,
  IMAGE_LARGE_SIZE,
  IMAGE_MEDIUM_SIZE,
  IMAGE_SMALL_SIZE,
  NO_SIZE,
  type CropAnchor,
  type EncodedImage,
  type Size,
} from '../core/image/types';
import { createLogger } from '../utils/logger';

const logger = createLogger('image-resize');

/** Image field values as stored on a record; null or false means no image. */
export type ImageFieldValue = EncodedImage | null | false | undefined;

export type ImageFieldValues = Record<string, ImageFieldValue>;

export interface VariantNames {
  /** Key of each variant in the result; false leaves the variant out. */
  big?: string | false;
  large?: string | false;
  medium?: string | false;
  small?: string | false;
}

export interface ResizeImagesOptions {
  returnBig?: boolean;
  returnLarge?: boolean;
  returnMedium?: boolean;
  returnSmall?: boolean;
  bigName?: string;
  largeName?: string;
  mediumName?: string;
  smallName?: string;
}

const DEFAULT_NAMES = {
  big: 'image',
  large: 'image_large',
  medium: 'image_medium',
  small: 'image_small',
} as const;

const SIZE_BY_SUFFIX: Readonly<Record<string, Size>> = {
  big: IMAGE_BIG_SIZE,
  large: IMAGE_LARGE_SIZE,
  medium: IMAGE_MEDIUM_SIZE,
  small: IMAGE_SMALL_SIZE,
};

/**
 * Guess a preset size from a field name suffix (`image_medium` -> 128x128).
 * The bare `image` field is the big variant; unknown suffixes give 0x0.
 */
export function guessSizeFromFieldName(fieldName: string): Size {
  const suffix = fieldName === 'image' ? 'big' : fieldName.split('_').pop() ?? '';
  return SIZE_BY_SUFFIX[suffix] ?? NO_SIZE;
}

/**
 * Fixed-size variants and convenience entry points over an ImageProcessor.
 */
export class ImageResizeService {
  constructor(private readonly processor: ImageProcessor) {}

  async resizeImage(source: ImageFieldValue, size: Size = IMAGE_BIG_SIZE, filetype?: string): Promise<EncodedImage | null> {
    return this.processor.process(source || null, { size, outputFormat: filetype });
  }

  async resizeImageBig(source: ImageFieldValue, filetype?: string): Promise<EncodedImage | null> {
    return this.resizeImage(source, IMAGE_BIG_SIZE, filetype);
  }

  async resizeImageLarge(source: ImageFieldValue, filetype?: string): Promise<EncodedImage | null> {
    return this.resizeImage(source, IMAGE_LARGE_SIZE, filetype);
  }

  async resizeImageMedium(source: ImageFieldValue, filetype?: string): Promise<EncodedImage | null> {
    return this.resizeImage(source, IMAGE_MEDIUM_SIZE, filetype);
  }

  async resizeImageSmall(source: ImageFieldValue, filetype?: string): Promise<EncodedImage | null> {
    return this.resizeImage(source, IMAGE_SMALL_SIZE, filetype);
  }

  /**
   * Downscale to `maxWidth` (0 keeps the width) with the resolution guard on.
   */
  async optimizeForWeb(source: ImageFieldValue, maxWidth = 0, quality = DEFAULT_QUALITY): Promise<EncodedImage | null> {
    return this.processor.process(source || null, {
      size: { width: maxWidth, height: 0 },
      verifyResolution: true,
      quality,
    });
  }

  async cropImage(
    source: ImageFieldValue,
    size: Size,
    type: Exclude<CropAnchor, 'none'> = 'center',
    imageFormat?: string
  ): Promise<EncodedImage | null> {
    return this.processor.process(source || null, { size, crop: type, outputFormat: imageFormat });
  }

  async colorize(source: ImageFieldValue): Promise<EncodedImage | null> {
    return this.processor.process(source || null, { colorize: true });
  }

  async limitedResize(source: ImageFieldValue, width = 0, height = 0, crop = false): Promise<EncodedImage | null> {
    return this.processor.process(source || null, {
      size: { width, height },
      crop: crop ? 'center' : 'none',
    });
  }

  /**
   * Whether the image is wider or taller than `size`. False for empty and SVG sources.
   */
  async isSizeAbove(source: ImageFieldValue, size: Size = IMAGE_BIG_SIZE): Promise<boolean> {
    if (!source || isSvgPayload(source)) {
      return false;
    }
    const info = await this.processor.inspect(source);
    return info.width > size.width || info.height > size.height;
  }

  /**
   * Big, large, medium and small variants of one image, keyed by `names`.
   */
  async getResizedImages(source: ImageFieldValue, names: VariantNames = {}): Promise<Record<string, EncodedImage | null>> {
    const resolved = { ...DEFAULT_NAMES, ...names };
    const jobs: Array<[string, Promise<EncodedImage | null>]> = [];

    if (resolved.big) {
      jobs.push([resolved.big, this.resizeImageBig(source)]);
    }
    if (resolved.large) {
      jobs.push([resolved.large, this.resizeImageLarge(source)]);
    }
    if (resolved.medium) {
      jobs.push([resolved.medium, this.resizeImageMedium(source)]);
    }
    if (resolved.small) {
      jobs.push([resolved.small, this.resizeImageSmall(source)]);
    }

    const results = await Promise.all(jobs.map(([, job]) => job));
    return Object.fromEntries(jobs.map(([name], index) => [name, results[index]]));
  }

  /**
   * Fill the requested variants of `vals` from the biggest image present.
   *
   * When the image keys exist but hold no image, the requested keys are set
   * to null; when none of the keys exist, `vals` is left untouched.
   */
  async resizeImages(vals: ImageFieldValues, options: ResizeImagesOptions = {}): Promise<ImageFieldValues> {
    const {
      returnBig = true,
      returnLarge = false,
      returnMedium = true,
      returnSmall = true,
      bigName = DEFAULT_NAMES.big,
      largeName = DEFAULT_NAMES.large,
      mediumName = DEFAULT_NAMES.medium,
      smallName = DEFAULT_NAMES.small,
    } = options;

    const biggest = vals[bigName] || vals[largeName] || vals[mediumName] || vals[smallName];

    if (biggest) {
      const variants = await this.getResizedImages(biggest, {
        big: returnBig && bigName,
        large: returnLarge && largeName,
        medium: returnMedium && mediumName,
        small: returnSmall && smallName,
      });
      Object.assign(vals, variants);
      logger.debug('Resized image variants', { fields: Object.keys(variants) });
    } else if ([bigName, largeName, mediumName, smallName].some((name) => name in vals)) {
      const requested: Array<[boolean, string]> = [
        [returnBig, bigName],
        [returnLarge, largeName],
        [returnMedium, mediumName],
        [returnSmall, smallName],
      ];
      for (const [wanted, name] of requested) {
        if (wanted) {
          vals[name] = null;
        }
      }
    }

    return vals;
  }
}
