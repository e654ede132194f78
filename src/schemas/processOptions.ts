import { z } from 'zod';
import { InvalidOptionsError } from '../core/image/errors';
import { DEFAULT_QUALITY, type ProcessOptions, type Size } from '../core/image/types';

/**
 * Validation schemas for pipeline options.
 * Shared by the transformer, the resize service and the CLI.
 */

export const SizeSchema = z.object({
  width: z.number().int().min(0),
  height: z.number().int().min(0),
});

export const CropAnchorSchema = z.enum(['none', 'center', 'top', 'bottom']);

export const ProcessOptionsSchema = z.object({
  size: SizeSchema.default({ width: 0, height: 0 }),
  verifyResolution: z.boolean().default(false),
  quality: z.number().int().min(1).max(95).default(DEFAULT_QUALITY),
  crop: CropAnchorSchema.default('none'),
  colorize: z.boolean().default(false),
  // Free-form on purpose: unknown formats resolve to JPEG
  outputFormat: z.string().optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export const parseProcessOptions = (input: unknown): ProcessOptions => {
  const result = ProcessOptionsSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new InvalidOptionsError(`Invalid image processing options: ${issues.join('; ')}`, issues);
  }
  return result.data;
};

const SIZE_SPEC_PATTERN = /^(\d*)x(\d*)$/i;

/**
 * Parse `WxH`, `Wx`, `xH` or a bare width. Missing sides are 0.
 */
export const parseSizeSpec = (spec: string): Size => {
  const trimmed = spec.trim();

  if (/^\d+$/.test(trimmed)) {
    return { width: parseInt(trimmed, 10), height: 0 };
  }

  const match = SIZE_SPEC_PATTERN.exec(trimmed);
  if (!match || (!match[1] && !match[2])) {
    throw new InvalidOptionsError(`Invalid size: ${spec}`, [`size: expected WxH, got "${spec}"`]);
  }

  return {
    width: match[1] ? parseInt(match[1], 10) : 0,
    height: match[2] ? parseInt(match[2], 10) : 0,
  };
};
