import dotenv from 'dotenv';
import { z } from 'zod';
import { DEFAULT_QUALITY, IMAGE_MAX_RESOLUTION } from './core/image/types';

dotenv.config();

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[]) {
    super(message);
    this.name = 'ConfigError';
  }
}

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

// Environment variables are strings; coerce and range-check them here
const EnvSchema = z.object({
  IMAGE_MAX_RESOLUTION: z.coerce.number().int().positive().default(IMAGE_MAX_RESOLUTION),
  IMAGE_DEFAULT_QUALITY: z.coerce.number().int().min(1).max(95).default(DEFAULT_QUALITY),
  SHARP_CONCURRENCY: z.coerce.number().int().min(0).default(0),
  SHARP_CACHE: booleanFromEnv.default('true'),
});

export interface Config {
  imaging: {
    maxResolution: number;
    defaultQuality: number;
  };
  codec: {
    concurrency: number;
    cache: boolean;
  };
}

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = EnvSchema.safeParse(env);

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const parsed = result.data;
  return {
    imaging: {
      maxResolution: parsed.IMAGE_MAX_RESOLUTION,
      defaultQuality: parsed.IMAGE_DEFAULT_QUALITY,
    },
    codec: {
      concurrency: parsed.SHARP_CONCURRENCY,
      cache: parsed.SHARP_CACHE,
    },
  };
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = parseConfig(process.env);
  }
  return cachedConfig;
}
