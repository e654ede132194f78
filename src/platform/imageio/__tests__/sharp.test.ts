import { describe, test, expect } from '@jest/globals';
import sharp from 'sharp';
import { DecodeError, ResolutionExceededError } from '../../../core/image/errors';
import type { Channels, DecodedImage, PixelMode } from '../../../core/image/types';
import { ImageTransformer } from '../../../processing/ImageTransformer';
import { MathRandomColorSource } from '../../random/colorSource';
import { SharpImageCodec } from '../sharp';

const codec = new SharpImageCodec();

function createTransformer(maxResolution?: number): ImageTransformer {
  return new ImageTransformer({ codec, colorSource: new MathRandomColorSource(), maxResolution });
}

// Opaque fills are written without an alpha channel
async function solidPng(width: number, height: number, alpha = 1): Promise<string> {
  const bytes = await sharp({
    create: {
      width,
      height,
      channels: alpha < 1 ? 4 : 3,
      background: { r: 51, g: 102, b: 153, alpha },
    },
  })
    .png()
    .toBuffer();
  return bytes.toString('base64');
}

async function solidJpeg(width: number, height: number): Promise<string> {
  const bytes = await sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 120, b: 40 } },
  })
    .jpeg()
    .toBuffer();
  return bytes.toString('base64');
}

async function solidGif(width: number, height: number): Promise<string> {
  const bytes = await sharp({
    create: { width, height, channels: 3, background: { r: 255, g: 0, b: 0 } },
  })
    .gif()
    .toBuffer();
  return bytes.toString('base64');
}

async function translucentPalettePng(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 4, background: { r: 0, g: 0, b: 255, alpha: 0.5 } },
  })
    .png({ palette: true })
    .toBuffer();
}

async function grayAlphaPng(width: number, height: number): Promise<Buffer> {
  const samples = Buffer.from(Array.from({ length: width * height }, () => [100, 128]).flat());
  return sharp(samples, { raw: { width, height, channels: 2 } }).png().toBuffer();
}

function rawImage(samples: number[], channels: Channels, pixelMode: PixelMode, width = 1): DecodedImage {
  return {
    data: Buffer.from(samples),
    width,
    height: samples.length / channels / width,
    channels,
    pixelMode,
    intrinsicFormat: 'png',
  };
}

function decoded(result: string | null): Buffer {
  if (result === null) {
    throw new Error('Expected an encoded image, got null');
  }
  return Buffer.from(result, 'base64');
}

describe('SharpImageCodec', () => {
  test('thumbnails a PNG and writes it as an indexed PNG', async () => {
    const transformer = createTransformer();

    const result = decoded(await transformer.process(await solidPng(2000, 1000), { size: { width: 500, height: 0 } }));
    const metadata = await sharp(result).metadata();

    expect(metadata.format).toBe('png');
    expect(metadata.width).toBe(500);
    expect(metadata.height).toBe(250);
    // IHDR color type 3: indexed colour
    expect(result[25]).toBe(3);
  });

  test('crops a JPEG to the exact requested size', async () => {
    const transformer = createTransformer();

    const result = decoded(
      await transformer.process(await solidJpeg(300, 300), { size: { width: 100, height: 200 }, crop: 'top' })
    );
    const metadata = await sharp(result).metadata();

    expect(metadata.format).toBe('jpeg');
    expect(metadata.width).toBe(100);
    expect(metadata.height).toBe(200);
  });

  test('keeps dimensions when no size is requested', async () => {
    const transformer = createTransformer();

    const result = decoded(await transformer.process(await solidPng(37, 23)));
    const metadata = await sharp(result).metadata();

    expect(metadata.width).toBe(37);
    expect(metadata.height).toBe(23);
  });

  test('keeps transparency of PNG output', async () => {
    const transformer = createTransformer();

    const result = decoded(await transformer.process(await solidPng(16, 16, 0.5)));
    const metadata = await sharp(result).metadata();

    expect(metadata.hasAlpha).toBe(true);
  });

  test('colorizes a transparent PNG into an opaque JPEG', async () => {
    const transformer = createTransformer();

    const result = decoded(
      await transformer.process(await solidPng(20, 20, 0), { colorize: true, outputFormat: 'JPEG' })
    );
    const metadata = await sharp(result).metadata();

    expect(metadata.format).toBe('jpeg');
    expect(metadata.hasAlpha).toBe(false);
    expect(metadata.channels).toBe(3);
  });

  test('writes GIF when asked to', async () => {
    const transformer = createTransformer();

    const result = decoded(await transformer.process(await solidJpeg(40, 30), { outputFormat: 'GIF' }));
    const metadata = await sharp(result).metadata();

    expect(metadata.format).toBe('gif');
    expect(metadata.width).toBe(40);
    expect(metadata.height).toBe(30);
  });

  test('rejects payloads that are not images', async () => {
    const transformer = createTransformer();

    await expect(transformer.process('aGVsbG8=')).rejects.toBeInstanceOf(DecodeError);
  });

  test('rejects images above the resolution limit before decoding', async () => {
    const transformer = createTransformer(10_000);

    const error = await transformer
      .process(await solidPng(200, 100), { verifyResolution: true })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ResolutionExceededError);
    expect(error).toHaveProperty(
      'message',
      'Image size excessive, uploaded images must be smaller than 0.001 million pixels.'
    );
  });

  test('reports grayscale and palette modes from the header', async () => {
    const gray = await sharp(Buffer.alloc(16 * 16, 128), { raw: { width: 16, height: 16, channels: 1 } })
      .png()
      .toBuffer();
    const indexed = await sharp({
      create: { width: 16, height: 16, channels: 3, background: { r: 255, g: 0, b: 0 } },
    })
      .png({ palette: true })
      .toBuffer();

    await expect(codec.inspect(gray)).resolves.toEqual({
      width: 16,
      height: 16,
      format: 'png',
      pixelMode: 'grayscale',
    });
    await expect(codec.inspect(indexed)).resolves.toMatchObject({ pixelMode: 'palette' });
  });

  test('decodes palette images as expanded samples', async () => {
    const indexed = await sharp({
      create: { width: 8, height: 4, channels: 3, background: { r: 0, g: 255, b: 0 } },
    })
      .png({ palette: true })
      .toBuffer();

    const image = await codec.decode(indexed);

    expect(image.pixelMode).toBe('palette');
    expect(image.channels).toBe(3);
    expect(Array.from(image.data.subarray(0, 3))).toEqual([0, 255, 0]);
  });

  test('crops and resizes raw data', async () => {
    const image = await codec.decode(Buffer.from(await solidJpeg(64, 64), 'base64'));

    const cropped = await codec.crop(image, { left: 8, top: 0, width: 32, height: 64 });
    const resized = await codec.resize(cropped, { width: 16, height: 32 }, 'lanczos3');

    expect([cropped.width, cropped.height]).toEqual([32, 64]);
    expect([resized.width, resized.height, resized.channels]).toEqual([16, 32, 3]);
  });

  describe('palette and alpha sources', () => {
    test('resizes a GIF and writes it back as GIF', async () => {
      const transformer = createTransformer();

      const result = decoded(await transformer.process(await solidGif(40, 20), { size: { width: 20, height: 0 } }));
      const metadata = await sharp(result).metadata();

      expect(metadata.format).toBe('gif');
      expect(metadata.width).toBe(20);
      expect(metadata.height).toBe(10);
    });

    test('decodes an opaque GIF without an alpha band', async () => {
      const image = await codec.decode(Buffer.from(await solidGif(20, 10), 'base64'));

      expect(image.pixelMode).toBe('palette');
      expect(image.channels).toBe(3);
    });

    test('writes an opaque GIF as an indexed PNG', async () => {
      const transformer = createTransformer();

      const result = decoded(await transformer.process(await solidGif(20, 10), { outputFormat: 'PNG' }));
      const metadata = await sharp(result).metadata();

      expect(metadata.format).toBe('png');
      expect([metadata.width, metadata.height]).toEqual([20, 10]);
      expect(result[25]).toBe(3);
    });

    test('keeps the transparency of a palette PNG as RGBA', async () => {
      const transformer = createTransformer();
      const source = await translucentPalettePng(16, 8);

      await expect(codec.inspect(source)).resolves.toMatchObject({ pixelMode: 'palette' });

      const result = decoded(await transformer.process(source.toString('base64')));
      const metadata = await sharp(result).metadata();

      expect(metadata.hasAlpha).toBe(true);
      // IHDR color type 6: truecolour with alpha
      expect(result[25]).toBe(6);
    });

    test('writes grayscale with alpha as three-channel JPEG', async () => {
      const transformer = createTransformer();
      const source = await grayAlphaPng(12, 6);

      await expect(codec.inspect(source)).resolves.toMatchObject({ pixelMode: 'grayscale-alpha' });

      const result = decoded(await transformer.process(source.toString('base64'), { outputFormat: 'JPEG' }));
      const metadata = await sharp(result).metadata();

      expect(metadata.format).toBe('jpeg');
      expect(metadata.channels).toBe(3);
      expect(metadata.hasAlpha).toBe(false);
    });
  });

  describe('pixel operations', () => {
    test('flattens translucent pixels over the background', async () => {
      const image = rawImage([255, 255, 255, 128], 4, 'rgba');

      const result = await codec.flatten(image, { r: 32, g: 32, b: 32 });

      expect(result.channels).toBe(3);
      expect(result.pixelMode).toBe('rgb');
      for (const value of result.data) {
        expect(value).toBeGreaterThanOrEqual(143);
        expect(value).toBeLessThanOrEqual(144);
      }
    });

    test('flattens transparent grayscale to the background colour', async () => {
      const image = rawImage([200, 0, 200, 0], 2, 'grayscale-alpha', 2);

      const result = await codec.flatten(image, { r: 56, g: 80, b: 224 });

      expect(Array.from(result.data)).toEqual([56, 80, 224, 56, 80, 224]);
    });

    test('expands grayscale with alpha to RGB', async () => {
      const result = await codec.toRgb(rawImage([200, 255], 2, 'grayscale-alpha'));

      expect(result.pixelMode).toBe('rgb');
      expect(Array.from(result.data)).toEqual([200, 200, 200]);
    });

    test('drops the alpha band of RGBA', async () => {
      const result = await codec.toRgb(rawImage([1, 2, 3, 4, 5, 6, 7, 8], 4, 'rgba', 2));

      expect(Array.from(result.data)).toEqual([1, 2, 3, 5, 6, 7]);
    });

    test('extracts alpha samples', async () => {
      await expect(codec.extractAlpha(rawImage([1, 2, 3, 77, 4, 5, 6, 78], 4, 'rgba', 2))).resolves.toEqual(
        Buffer.from([77, 78])
      );
      await expect(codec.extractAlpha(rawImage([1, 2, 3], 3, 'rgb'))).resolves.toBeNull();
    });

    test('joins alpha onto colour samples', async () => {
      const result = await codec.joinAlpha(rawImage([0, 51, 102, 0, 51, 102], 3, 'palette', 2), Buffer.from([0, 200]));

      expect(result.pixelMode).toBe('rgba');
      expect(Array.from(result.data)).toEqual([0, 51, 102, 0, 0, 51, 102, 200]);
    });

    test('rejects alpha of the wrong length', async () => {
      await expect(codec.joinAlpha(rawImage([0, 0, 0, 0, 0, 0], 3, 'rgb', 2), Buffer.alloc(3))).rejects.toBeInstanceOf(
        RangeError
      );
    });
  });
});
