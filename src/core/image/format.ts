import { DecodeError } from './errors';
import type { EncodedImage, ImageFormat, OutputFormat } from './types';

// Only the first base64 character (6 bits) is looked at; accurate enough
// to tell the supported types apart without decoding the payload.
export const FILETYPE_BASE64_MAGICWORD: Readonly<Record<string, string>> = {
  '/': 'jpg',
  R: 'gif',
  i: 'png',
  P: 'svg+xml',
};

const DEFAULT_SNIFFED_TYPE = 'png';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['PNG', 'JPEG', 'GIF'];

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function sniffImageType(source: EncodedImage): string {
  return FILETYPE_BASE64_MAGICWORD[source.charAt(0)] ?? DEFAULT_SNIFFED_TYPE;
}

export function isSvgPayload(source: EncodedImage): boolean {
  return source.charAt(0) === 'P';
}

/**
 * Data URL per RFC 2397, defaulting to the png type when the first
 * character matches no known format.
 */
export function imageDataUri(source: EncodedImage): string {
  return `data:image/${sniffImageType(source)};base64,${source}`;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Requested format, else the intrinsic one; BMP becomes PNG and anything
 * outside PNG/JPEG/GIF becomes JPEG.
 */
export function resolveOutputFormat(requested: string | undefined, intrinsic: ImageFormat): OutputFormat {
  const format = (requested || intrinsic).toUpperCase();

  if (format === 'BMP') {
    return 'PNG';
  }
  return isOutputFormat(format) ? format : 'JPEG';
}

export function decodeBase64(source: EncodedImage): Buffer {
  const compact = source.replace(/\s+/g, '');

  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new DecodeError('Invalid base64 image payload', { length: source.length });
  }

  return Buffer.from(compact, 'base64');
}

export function encodeBase64(bytes: Buffer): EncodedImage {
  return bytes.toString('base64');
}
