/**
 * Image Codec Port Interface
 *
 * Clean abstraction over the raster codec library. The transformation
 * pipeline only ever talks to these interfaces; concrete sharp-backed
 * implementations live under platform/.
 */

import type {
  CropRegion,
  DecodedImage,
  EncodedImage,
  EncodeOptions,
  ImageInfo,
  OutputFormat,
  ProcessOptions,
  ResampleFilter,
  RgbColor,
  Size,
} from './types';

export interface ImageCodec {
  /**
   * Read dimensions, format and pixel mode from the header only.
   * Rejects with DecodeError when the bytes are not a recognizable raster image.
   */
  inspect(bytes: Buffer): Promise<ImageInfo>;

  /**
   * Decode the full raster into 8-bit interleaved pixels.
   */
  decode(bytes: Buffer): Promise<DecodedImage>;

  crop(image: DecodedImage, region: CropRegion): Promise<DecodedImage>;

  /**
   * Resample to exactly `size`. Aspect ratio is the caller's concern.
   */
  resize(image: DecodedImage, size: Size, filter: ResampleFilter): Promise<DecodedImage>;

  /**
   * Composite over a solid `background`, using the image's own alpha as the
   * mask. The result is opaque three-channel RGB.
   */
  flatten(image: DecodedImage, background: RgbColor): Promise<DecodedImage>;

  /**
   * Three-channel colour: grayscale is expanded and alpha is dropped without
   * compositing. Three-channel input keeps its pixel mode.
   */
  toRgb(image: DecodedImage): Promise<DecodedImage>;

  /** One alpha sample per pixel, or null when the image has no alpha. */
  extractAlpha(image: DecodedImage): Promise<Buffer | null>;

  /**
   * Attach `alpha` (one sample per pixel) to three-channel colour; the result
   * is rgba. Rejects with RangeError when the sample count does not match.
   */
  joinAlpha(image: DecodedImage, alpha: Buffer): Promise<DecodedImage>;

  encode(image: DecodedImage, format: OutputFormat, options: EncodeOptions): Promise<Buffer>;
}

export interface RandomColorSource {
  /** One of 32, 56, 80, ..., 224. */
  nextChannelValue(): number;
}

/**
 * What callers of the pipeline depend on; ImageTransformer implements it.
 */
export interface ImageProcessor {
  process(
    source: EncodedImage | null | undefined,
    options?: Partial<ProcessOptions>
  ): Promise<EncodedImage | null>;

  inspect(source: EncodedImage): Promise<ImageInfo>;
}
