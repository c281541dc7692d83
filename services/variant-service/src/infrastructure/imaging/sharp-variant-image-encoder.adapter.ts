import { Injectable } from '@nestjs/common';
import sharp from 'sharp';
import type {
  EncodeVariantInput,
  EncodedVariant,
  SourceImageInfo,
  VariantImageEncoderPort,
} from '../../application/variants/ports/variant-image-encoder.port';
import { THUMBNAIL_WIDTH } from '../../domain/variants/size-catalog';
import {
  describePolicy,
  outputContentType,
  outputExtension,
  type EncodeOptions,
  type ImageSource,
  type VariantPolicy,
} from '../../domain/variants/variant-encoding';
import { DecodeError, EncodeError, describeCause } from '../../domain/variants/variant-errors';

@Injectable()
export class SharpVariantImageEncoderAdapter implements VariantImageEncoderPort {
  async readSourceInfo(source: ImageSource): Promise<SourceImageInfo> {
    return readInfo(source);
  }

  async encodeVariant(input: EncodeVariantInput): Promise<EncodedVariant> {
    await readInfo(input.source, input.variantName);

    const transformer = applyOutputFormat(
      applyPolicy(sharp(input.source).rotate(), input.policy),
      input.options,
    );
    const pipeline = input.options.stripMetadata ? transformer : transformer.withMetadata();

    try {
      const { data, info } = await pipeline.toBuffer({ resolveWithObject: true });

      return {
        variantName: input.variantName,
        buffer: data,
        contentType: outputContentType(input.options.outputFormat),
        extension: outputExtension(input.options.outputFormat),
        width: info.width,
        height: info.height,
      };
    } catch (error) {
      throw new EncodeError(
        `Failed to encode variant "${input.variantName}" as ${input.options.outputFormat} ` +
          `with ${describePolicy(input.policy)}: ${describeCause(error)}`,
        { variantName: input.variantName, cause: error },
      );
    }
  }
}

async function readInfo(source: ImageSource, variantName?: string): Promise<SourceImageInfo> {
  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(source).metadata();
  } catch (error) {
    throw new DecodeError(`Source image cannot be decoded: ${describeCause(error)}`, {
      variantName,
      cause: error,
    });
  }

  if (!metadata.width || !metadata.height) {
    throw new DecodeError('Source image has no readable dimensions.', { variantName });
  }

  return {
    width: metadata.width,
    height: metadata.height,
    format: metadata.format,
  };
}

function applyPolicy(pipeline: sharp.Sharp, policy: VariantPolicy): sharp.Sharp {
  switch (policy.kind) {
    case 'original':
      return pipeline;
    case 'thumbnail':
      return pipeline.resize({ width: THUMBNAIL_WIDTH, height: THUMBNAIL_WIDTH, fit: 'inside' });
    case 'width':
      return pipeline.resize({ width: policy.width });
  }
}

function applyOutputFormat(pipeline: sharp.Sharp, options: EncodeOptions): sharp.Sharp {
  const effort = clamp(Math.trunc(options.effort), 1, 10);

  switch (options.outputFormat) {
    case 'webp':
      return pipeline.webp({
        quality: options.quality,
        effort: scaleEffort(effort, 6),
        minSize: options.minimizeFileSize,
      });
    case 'avif':
      return pipeline.avif({ quality: options.quality, effort: scaleEffort(effort, 9) });
    case 'jpeg':
      // jpeg has no effort setting
      return pipeline.jpeg({ quality: options.quality, mozjpeg: options.minimizeFileSize });
    case 'png':
      return pipeline.png(pngOutputOptions(options));
    case 'gif':
      return pipeline.gif({ effort });
  }
}

/** Quality and effort make sharp quantise to a palette. */
export function pngOutputOptions(options: EncodeOptions): sharp.PngOptions {
  return {
    quality: options.quality,
    effort: clamp(Math.trunc(options.effort), 1, 10),
    compressionLevel: options.minimizeFileSize ? 9 : 6,
    adaptiveFiltering: options.minimizeFileSize,
  };
}

/** Maps effort 1..10 onto a codec's 0..max range. */
function scaleEffort(effort: number, max: number): number {
  return Math.round(((effort - 1) * max) / 9);
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
