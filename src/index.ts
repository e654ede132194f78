export * from './core/image/types';
export * from './core/image/errors';
export type { ImageCodec, ImageProcessor, RandomColorSource } from './core/image/ImageCodecPort';
export {
  FILETYPE_BASE64_MAGICWORD,
  imageDataUri,
  isSvgPayload,
  resolveOutputFormat,
  sniffImageType,
} from './core/image/format';
export { computeCropWindow, computeThumbnailSize, resolveAskedSize } from './core/image/geometry';
export { ImageTransformer, type ImageTransformerOptions } from './processing/ImageTransformer';
export {
  ImageResizeService,
  guessSizeFromFieldName,
  type ImageFieldValue,
  type ImageFieldValues,
  type ResizeImagesOptions,
  type VariantNames,
} from './services/ImageResizeService';
export { SharpImageCodec, initImageCodec, type CodecSettings } from './platform/imageio/sharp';
export { MathRandomColorSource } from './platform/random/colorSource';
export { ConfigError, getConfig, parseConfig, type Config } from './config';
export { createImageResizeService, createImageTransformer } from './app/wiring';
export { parseProcessOptions, parseSizeSpec } from './schemas/processOptions';
