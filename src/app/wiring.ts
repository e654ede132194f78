import type { ImageCodec, RandomColorSource } from '../core/image/ImageCodecPort';
import { getConfig, type Config } from '../config';
import { SharpImageCodec, initImageCodec } from '../platform/imageio/sharp';
import { MathRandomColorSource } from '../platform/random/colorSource';
import { ImageTransformer } from '../processing/ImageTransformer';
import { ImageResizeService } from '../services/ImageResizeService';

/**
 * Composition root for dependency injection.
 * This is the ONLY place that should import concrete adapter implementations.
 */

export interface WiringOverrides {
  config?: Config;
  codec?: ImageCodec;
  colorSource?: RandomColorSource;
}

export function createImageTransformer(overrides: WiringOverrides = {}): ImageTransformer {
  const config = overrides.config ?? getConfig();

  if (!overrides.codec) {
    initImageCodec(config.codec);
  }

  return new ImageTransformer({
    codec: overrides.codec ?? new SharpImageCodec(),
    colorSource: overrides.colorSource ?? new MathRandomColorSource(),
    maxResolution: config.imaging.maxResolution,
    defaultQuality: config.imaging.defaultQuality,
  });
}

export function createImageResizeService(overrides: WiringOverrides = {}): ImageResizeService {
  return new ImageResizeService(createImageTransformer(overrides));
}
