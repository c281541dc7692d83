#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { createJsonLogEntry, SYSTEM_CORRELATION_ID } from '@image-variants/shared';
import { parseSizeCatalog } from '../../domain/variants/size-catalog';
import { ValidationError } from '../../domain/variants/variant-errors';
import { SharpVariantImageEncoderAdapter } from '../../infrastructure/imaging/sharp-variant-image-encoder.adapter';
import { LocalFilesystemVariantStorageAdapter } from '../../infrastructure/storage/local-filesystem-variant-storage.adapter';
import { DEFAULT_CLI_FORMATS, DEFAULT_CLI_SIZES, OptimizeImagesCommand } from './optimize-images.command';

const SERVICE_NAME = 'optimize-images';

async function main(): Promise<void> {
  const argv = await yargs(hideBin(process.argv))
    .scriptName(SERVICE_NAME)
    .command('$0 <input>', 'Create resized and re-encoded copies of an image or a directory of images', (command) =>
      command.positional('input', {
        type: 'string',
        demandOption: true,
        describe: 'Image file or directory to optimize',
      }),
    )
    .option('output', {
      alias: 'o',
      type: 'string',
      demandOption: true,
      describe: 'Output directory',
    })
    .option('sizes', {
      type: 'string',
      default: DEFAULT_CLI_SIZES.join(','),
      describe: 'Comma-separated size names (catalog names, thumb, original)',
    })
    .option('formats', {
      type: 'string',
      default: DEFAULT_CLI_FORMATS.join(','),
      describe: 'Comma-separated output formats',
    })
    .option('quality', {
      type: 'number',
      default: 75,
      describe: 'Image quality 1-100',
    })
    .option('effort', {
      type: 'number',
      default: 10,
      describe: 'Compression effort 1-10',
    })
    .strict()
    .help()
    .parseAsync();

  // `input` comes from the default command builder and is untyped on the outer argv
  const inputPath = argv.input;
  if (typeof inputPath !== 'string') {
    throw new ValidationError('An input file or directory is required.');
  }

  const command = new OptimizeImagesCommand(
    new SharpVariantImageEncoderAdapter(),
    new LocalFilesystemVariantStorageAdapter(),
    parseSizeCatalog(process.env.VARIANT_SIZES),
  );

  const report = await command.run({
    inputPath,
    outputDir: argv.output,
    sizes: splitList(argv.sizes),
    formats: splitList(argv.formats),
    quality: argv.quality,
    effort: argv.effort,
  });

  if (report.failed.length > 0) {
    process.exitCode = 1;
  }
}

function splitList(raw: string): string[] {
  return raw
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

main().catch((error: unknown) => {
  const logger = new Logger('Bootstrap');
  logger.error(JSON.stringify(createJsonLogEntry({
    level: 'error',
    service: SERVICE_NAME,
    message: `${SERVICE_NAME} failed`,
    correlationId: SYSTEM_CORRELATION_ID,
    error,
  })));
  process.exitCode = 1;
});
