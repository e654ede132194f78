/**
 * Error taxonomy for the image pipeline.
 *
 * Every failure of `ImageTransformer.process` rejects with one of these.
 * An empty source or an SVG passthrough is never an error.
 */

export type ImageErrorCode =
  | 'DECODE_ERROR'
  | 'RESOLUTION_EXCEEDED'
  | 'ENCODE_ERROR'
  | 'INVALID_OPTIONS';

export class ImageProcessingError extends Error {
  constructor(
    message: string,
    public readonly code: ImageErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ImageProcessingError';
  }
}

export class DecodeError extends ImageProcessingError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DECODE_ERROR', context);
    this.name = 'DecodeError';
  }
}

export class ResolutionExceededError extends ImageProcessingError {
  constructor(
    public readonly limitMegapixels: number,
    public readonly width: number,
    public readonly height: number
  ) {
    super(
      `Image size excessive, uploaded images must be smaller than ${limitMegapixels} million pixels.`,
      'RESOLUTION_EXCEEDED',
      { limitMegapixels, width, height }
    );
    this.name = 'ResolutionExceededError';
  }
}

export class EncodeError extends ImageProcessingError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ENCODE_ERROR', context);
    this.name = 'EncodeError';
  }
}

export class InvalidOptionsError extends ImageProcessingError {
  constructor(message: string, public readonly issues: string[]) {
    super(message, 'INVALID_OPTIONS', { issues });
    this.name = 'InvalidOptionsError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
