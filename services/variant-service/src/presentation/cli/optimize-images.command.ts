import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { Logger } from '@nestjs/common';
import { createJsonLogEntry, SYSTEM_CORRELATION_ID } from '@image-variants/shared';
import type { VariantImageEncoderPort } from '../../application/variants/ports/variant-image-encoder.port';
import type { VariantObjectStoragePort } from '../../application/variants/ports/variant-object-storage.port';
import { fileExtension, stripExtension } from '../../domain/variants/naming-policy';
import {
  ORIGINAL_VERSION,
  THUMBNAIL_VERSION,
  getWidthFromSize,
  hasSize,
  type SizeCatalog,
} from '../../domain/variants/size-catalog';
import {
  buildCacheControl,
  outputContentType,
  outputExtension,
  parseOutputFormat,
  type EncodeOptions,
  type OutputFormat,
  type VariantPolicy,
} from '../../domain/variants/variant-encoding';
import { ValidationError, describeCause } from '../../domain/variants/variant-errors';

const SERVICE_NAME = 'optimize-images';

export const SUPPORTED_INPUT_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.webp', '.avif'] as const;
export const DEFAULT_CLI_SIZES = ['xs', 'sm', 'md', 'lg', 'xl', 'thumb'] as const;
export const DEFAULT_CLI_FORMATS = ['webp', 'avif', 'jpg'] as const;

export interface OptimizeImagesOptions {
  inputPath: string;
  outputDir: string;
  sizes?: readonly string[];
  formats?: readonly string[];
  quality?: number;
  effort?: number;
}

export interface OptimizeImagesFailure {
  inputPath: string;
  outputFileName?: string;
  reason: string;
}

export interface OptimizeImagesReport {
  processed: string[];
  created: string[];
  skipped: string[];
  failed: OptimizeImagesFailure[];
}

interface SizeTarget {
  name: string;
  policy: VariantPolicy;
}

interface OptimizePlan {
  sizes: SizeTarget[];
  formats: OutputFormat[];
  quality: number;
  effort: number;
}

/**
 * Writes `{base}_{size}.{format}` for every requested size and format. One
 * image failing (or being skipped) never stops the rest of a directory batch.
 */
export class OptimizeImagesCommand {
  private readonly logger = new Logger(OptimizeImagesCommand.name);

  constructor(
    private readonly encoder: VariantImageEncoderPort,
    private readonly storage: VariantObjectStoragePort,
    private readonly catalog: SizeCatalog,
  ) {}

  async run(options: OptimizeImagesOptions): Promise<OptimizeImagesReport> {
    const plan = this.buildPlan(options);
    const report: OptimizeImagesReport = { processed: [], created: [], skipped: [], failed: [] };

    const inputStat = await stat(options.inputPath).catch(() => undefined);
    if (!inputStat) {
      throw new ValidationError(`Input path does not exist: ${options.inputPath}`);
    }

    if (inputStat.isDirectory()) {
      await this.optimizeDirectory(options.inputPath, options.outputDir, plan, report);
    } else {
      await this.optimizeImage(options.inputPath, options.outputDir, '', plan, report);
    }

    this.log('info', 'Image optimization complete.', {
      processed: report.processed.length,
      created: report.created.length,
      skipped: report.skipped.length,
      failed: report.failed.length,
    });
    return report;
  }

  private buildPlan(options: OptimizeImagesOptions): OptimizePlan {
    const quality = options.quality ?? 75;
    const effort = options.effort ?? 10;
    if (!Number.isInteger(quality) || quality < 1 || quality > 100) {
      throw new ValidationError(`--quality must be an integer between 1 and 100, got ${quality}.`);
    }
    if (!Number.isInteger(effort) || effort < 1 || effort > 10) {
      throw new ValidationError(`--effort must be an integer between 1 and 10, got ${effort}.`);
    }

    const sizeNames: readonly string[] = options.sizes ?? DEFAULT_CLI_SIZES;
    const formatNames: readonly string[] = options.formats ?? DEFAULT_CLI_FORMATS;
    const sizes = sizeNames.map((name) => this.resolveSize(name));
    const formats = formatNames.map((format) => {
      try {
        return parseOutputFormat(format);
      } catch (error) {
        throw new ValidationError(describeCause(error), { cause: error });
      }
    });

    if (sizes.length === 0 || formats.length === 0) {
      throw new ValidationError('At least one size and one format are required.');
    }

    return { sizes, formats, quality, effort };
  }

  private resolveSize(name: string): SizeTarget {
    if (name === 'thumb' || name === THUMBNAIL_VERSION) {
      return { name, policy: { kind: 'thumbnail' } };
    }
    if (name === ORIGINAL_VERSION) {
      return { name, policy: { kind: 'original' } };
    }
    if (!hasSize(this.catalog, name)) {
      throw new ValidationError(`Unknown size "${name}".`, { variantName: name });
    }
    return { name, policy: { kind: 'width', width: getWidthFromSize(this.catalog, name) } };
  }

  private async optimizeDirectory(
    inputDir: string,
    outputDir: string,
    plan: OptimizePlan,
    report: OptimizeImagesReport,
  ): Promise<void> {
    const entries = await readdir(inputDir, { recursive: true });
    const files = entries
      .filter((relativePath) => !relativePath.split(path.sep).some((segment) => segment.startsWith('.')))
      .filter((relativePath) => isSupportedImage(relativePath))
      .sort();

    if (files.length === 0) {
      this.log('info', `No image files found in directory: ${inputDir}`);
      return;
    }

    this.log('info', `Found ${files.length} images to optimize.`);
    for (const [index, relativePath] of files.entries()) {
      this.log('info', `[${index + 1}/${files.length}] Processing ${path.basename(relativePath)}.`);
      await this.optimizeImage(
        path.join(inputDir, relativePath),
        outputDir,
        path.dirname(relativePath),
        plan,
        report,
      );
    }
  }

  private async optimizeImage(
    inputPath: string,
    outputDir: string,
    relativeDir: string,
    plan: OptimizePlan,
    report: OptimizeImagesReport,
  ): Promise<void> {
    if (!isSupportedImage(inputPath)) {
      report.skipped.push(inputPath);
      this.log('error', `Skipping unsupported file: ${inputPath}`);
      return;
    }

    try {
      await this.encoder.readSourceInfo(inputPath);
    } catch (error) {
      report.failed.push({ inputPath, reason: describeCause(error) });
      this.log('error', `Failed to process ${inputPath}.`, undefined, error);
      return;
    }

    report.processed.push(inputPath);
    const base = stripExtension(path.basename(inputPath));

    for (const size of plan.sizes) {
      for (const format of plan.formats) {
        const outputFileName = `${base}_${size.name}.${outputExtension(format)}`;
        try {
          const encoded = await this.encoder.encodeVariant({
            variantName: size.name,
            source: inputPath,
            policy: size.policy,
            options: encodeOptionsFor(format, plan),
          });
          const stored = await this.storage.putObject({
            bucket: outputDir,
            key: relativeDir && relativeDir !== '.' ? path.join(relativeDir, outputFileName) : outputFileName,
            body: encoded.buffer,
            contentType: outputContentType(format),
            cacheControl: buildCacheControl(0),
          });
          report.created.push(stored.kind === 'location' ? stored.location : stored.key);
          this.log('info', `Created ${outputFileName}.`);
        } catch (error) {
          report.failed.push({ inputPath, outputFileName, reason: describeCause(error) });
          this.log('error', `Failed to create ${outputFileName}.`, undefined, error);
        }
      }
    }
  }

  private log(level: 'info' | 'error', message: string, metadata?: Record<string, unknown>, error?: unknown): void {
    const line = JSON.stringify(createJsonLogEntry({
      level,
      service: SERVICE_NAME,
      message,
      correlationId: SYSTEM_CORRELATION_ID,
      metadata,
      error,
    }));

    if (level === 'error') {
      this.logger.error(line);
    } else {
      this.logger.log(line);
    }
  }
}

export function isSupportedImage(fileName: string): boolean {
  const extension = fileExtension(fileName);
  return SUPPORTED_INPUT_EXTENSIONS.some((candidate) => candidate === extension);
}

function encodeOptionsFor(format: OutputFormat, plan: OptimizePlan): EncodeOptions {
  return {
    outputFormat: format,
    quality: plan.quality,
    effort: plan.effort,
    minimizeFileSize: true,
    stripMetadata: true,
  };
}
