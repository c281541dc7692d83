import { Inject, Injectable } from '@nestjs/common';
import { buildPictureSources, type PictureSources } from '../../domain/variants/picture-sources';
import { largestSize } from '../../domain/variants/size-catalog';
import {
  ConfigError,
  StorageError,
  ValidationError,
  describeCause,
  isVariantPipelineError,
} from '../../domain/variants/variant-errors';
import type { UploadedReference, VariantUrlMap } from '../../domain/variants/variant-url-map';
import {
  SOURCE_OBJECT_READER_PORT,
  type ReadSourceObjectResult,
  type SourceObjectReaderPort,
} from './ports/source-object-reader.port';
import {
  VARIANT_PIPELINE_CONFIG,
  type VariantPipelineConfig,
} from './ports/variant-pipeline-config.port';
import { UploadCompleteSetUseCase } from './upload-complete-set.use-case';

interface CreateVariantSetInput {
  sourceBucket?: unknown;
  sourceObjectKey?: unknown;
  prefix?: unknown;
  fileName?: unknown;
  keepSourceName?: unknown;
  correlationId?: string;
}

export interface CreateVariantSetResult {
  uploadId: string;
  urls: VariantUrlMap;
  picture: PictureSources;
}

@Injectable()
export class VariantsApplicationService {
  constructor(
    @Inject(SOURCE_OBJECT_READER_PORT)
    private readonly sourceReader: SourceObjectReaderPort,
    @Inject(VARIANT_PIPELINE_CONFIG)
    private readonly config: VariantPipelineConfig,
    private readonly uploadCompleteSet: UploadCompleteSetUseCase,
  ) {}

  async createFromStoredObject(input: CreateVariantSetInput): Promise<CreateVariantSetResult> {
    const sourceBucket = normalizeRequiredString(input.sourceBucket, 'sourceBucket');
    const sourceObjectKey = normalizeRequiredString(input.sourceObjectKey, 'sourceObjectKey');
    const prefix = normalizeOptionalString(input.prefix, 'prefix');
    const fileName = normalizeOptionalString(input.fileName, 'fileName') ?? sourceObjectKey;
    const keepSourceName = normalizeOptionalBoolean(input.keepSourceName, 'keepSourceName');

    const source = await this.readSource(sourceBucket, sourceObjectKey);
    const result = await this.uploadCompleteSet.execute({
      source: source.buffer,
      fileName,
      prefix,
      keepSourceName,
      correlationId: input.correlationId,
    });

    return {
      uploadId: result.uploadId,
      urls: result.urls,
      picture: this.buildPicture(result.references),
    };
  }

  private async readSource(bucket: string, objectKey: string): Promise<ReadSourceObjectResult> {
    try {
      return await this.sourceReader.readObject(bucket, objectKey);
    } catch (error) {
      if (isVariantPipelineError(error)) {
        throw error;
      }
      throw new StorageError(`Failed to read ${bucket}/${objectKey}: ${describeCause(error)}`, { cause: error });
    }
  }

  private buildPicture(references: readonly UploadedReference[]): PictureSources {
    const byVariant = new Map(references.map((reference) => [reference.variantName, reference.location]));

    return buildPictureSources({
      catalog: this.config.catalog,
      versions: this.config.catalog.map((entry) => entry.name),
      base: largestSize(this.config.catalog).name,
      urlFor: (version) => {
        const url = byVariant.get(version);
        if (!url) {
          throw new ConfigError(`No stored variant for "${version}".`, { variantName: version });
        }
        return url;
      },
    });
  }
}

function normalizeRequiredString(value: unknown, field: string): string {
  const normalized = normalizeOptionalString(value, field);
  if (!normalized) {
    throw new ValidationError(`${field} is required.`);
  }
  return normalized;
}

function normalizeOptionalString(value: unknown, field: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError(`${field} must be a string.`);
  }
  const normalized = value.trim();
  return normalized ? normalized : undefined;
}

function normalizeOptionalBoolean(value: unknown, field: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'boolean') {
    throw new ValidationError(`${field} must be a boolean.`);
  }
  return value;
}
