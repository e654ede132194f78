#!/usr/bin/env node

import { Command } from 'commander';
import * as fs from 'fs/promises';
import { createImageTransformer } from './app/wiring';
import { ImageProcessingError, describeError } from './core/image/errors';
import { decodeBase64, imageDataUri } from './core/image/format';
import { CropAnchorSchema, parseSizeSpec } from './schemas/processOptions';
import { createLogger } from './utils/logger';

const logger = createLogger('cli');

interface ProcessCommandOptions {
  size?: string;
  crop?: string;
  format?: string;
  quality?: string;
  colorize?: boolean;
  verifyResolution?: boolean;
}

async function readBase64(inputPath: string): Promise<string> {
  const bytes = await fs.readFile(inputPath);
  return bytes.toString('base64');
}

async function processCommand(input: string, output: string, options: ProcessCommandOptions): Promise<void> {
  const transformer = createImageTransformer();
  const source = await readBase64(input);

  const result = await transformer.process(source, {
    size: options.size ? parseSizeSpec(options.size) : undefined,
    crop: options.crop ? CropAnchorSchema.parse(options.crop) : undefined,
    outputFormat: options.format,
    quality: options.quality ? parseInt(options.quality, 10) : undefined,
    colorize: Boolean(options.colorize),
    verifyResolution: Boolean(options.verifyResolution),
  });

  if (result === null) {
    logger.warn(`No image data in ${input}`);
    return;
  }

  await fs.writeFile(output, decodeBase64(result));
  logger.info(`Wrote ${output}`);
}

async function dataUriCommand(input: string): Promise<void> {
  process.stdout.write(`${imageDataUri(await readBase64(input))}\n`);
}

async function infoCommand(input: string): Promise<void> {
  const info = await createImageTransformer().inspect(await readBase64(input));
  process.stdout.write(`${info.width}x${info.height} ${info.format} ${info.pixelMode}\n`);
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('image-transformer')
    .description('Resize, crop, recolor and re-encode raster images');

  program
    .command('process')
    .description('Transform an image file')
    .argument('<input>', 'source image file')
    .argument('<output>', 'destination file')
    .option('-s, --size <WxH>', 'bounding size, e.g. 128x100, 500x or x200')
    .option('-c, --crop <anchor>', 'crop to the size ratio: center, top or bottom')
    .option('-f, --format <format>', 'output format: png, jpeg or gif')
    .option('-q, --quality <n>', 'JPEG quality, 1-95')
    .option('--colorize', 'replace the transparent background by a random color')
    .option('--verify-resolution', 'reject images above the resolution limit')
    .action(processCommand);

  program
    .command('data-uri')
    .description('Print the data URI of an image file')
    .argument('<input>', 'image file')
    .action(dataUriCommand);

  program
    .command('info')
    .description('Print dimensions, format and pixel mode of an image file')
    .argument('<input>', 'image file')
    .action(infoCommand);

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      const code = error instanceof ImageProcessingError ? error.code : 'UNEXPECTED';
      logger.error(`Command failed: ${describeError(error)}`, { code });
      process.exit(1);
    });
}
