import { describe, test, expect } from '@jest/globals';
import { ConfigError, parseConfig } from '../config';

describe('parseConfig', () => {
  test('applies defaults', () => {
    expect(parseConfig({})).toEqual({
      imaging: { maxResolution: 45_000_000, defaultQuality: 80 },
      codec: { concurrency: 0, cache: true },
    });
  });

  test('reads overrides from the environment', () => {
    const config = parseConfig({
      IMAGE_MAX_RESOLUTION: '1000000',
      IMAGE_DEFAULT_QUALITY: '60',
      SHARP_CONCURRENCY: '2',
      SHARP_CACHE: '0',
    });

    expect(config.imaging).toEqual({ maxResolution: 1_000_000, defaultQuality: 60 });
    expect(config.codec).toEqual({ concurrency: 2, cache: false });
  });

  test('rejects out of range values', () => {
    expect(() => parseConfig({ IMAGE_DEFAULT_QUALITY: '120' })).toThrow(ConfigError);

    try {
      parseConfig({ IMAGE_MAX_RESOLUTION: 'lots', SHARP_CACHE: 'yes' });
      throw new Error('expected parseConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toHaveProperty('issues', [
        expect.stringMatching(/^IMAGE_MAX_RESOLUTION: /),
        expect.stringMatching(/^SHARP_CACHE: /),
      ]);
    }
  });
});
