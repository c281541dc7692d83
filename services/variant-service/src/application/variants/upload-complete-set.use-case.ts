import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  createJsonLogEntry,
  ensureCorrelationId,
  generateId,
  mapWithLimit,
} from '@image-variants/shared';
import {
  baseName,
  buildVariantFileName,
  buildVariantObjectKey,
  stripExtension,
} from '../../domain/variants/naming-policy';
import { cacheControlFor, requireBucketName } from '../../domain/variants/pipeline-config';
import type { SizeSpec } from '../../domain/variants/size-catalog';
import type { ImageSource } from '../../domain/variants/variant-encoding';
import {
  EncodeError,
  StorageError,
  describeCause,
  isVariantPipelineError,
} from '../../domain/variants/variant-errors';
import {
  assembleVariantUrlMap,
  buildPublicUrl,
  type UploadedReference,
  type VariantUrlMap,
} from '../../domain/variants/variant-url-map';
import { VARIANT_SERVICE_NAME } from '../system/service-info.query';
import {
  VARIANT_IMAGE_ENCODER_PORT,
  type EncodedVariant,
  type VariantImageEncoderPort,
} from './ports/variant-image-encoder.port';
import {
  VARIANT_OBJECT_STORAGE_PORT,
  type VariantObjectStoragePort,
} from './ports/variant-object-storage.port';
import {
  VARIANT_PIPELINE_CONFIG,
  type VariantPipelineConfig,
} from './ports/variant-pipeline-config.port';

export interface UploadCompleteSetInput {
  source: ImageSource;
  /** Original upload name; only used for keys when `keepSourceName` is set. */
  fileName?: string;
  /** Object key prefix, defaults to the configured one. */
  prefix?: string;
  /** Reuse the source base name instead of a fresh id so re-uploads overwrite. */
  keepSourceName?: boolean;
  correlationId?: string;
}

export interface UploadCompleteSetResult {
  uploadId: string;
  urls: VariantUrlMap;
  references: UploadedReference[];
}

interface VariantUploadContext {
  bucket: string;
  prefix: string;
  uploadId: string;
  /** What the naming policy strips back down to `uploadId`. */
  baseFileName: string;
  source: ImageSource;
  correlationId: string;
}

/**
 * Encodes the source once per catalog entry and stores every variant.
 * All-or-nothing: the first failure is surfaced and no URL map is returned.
 * Variants already stored when a sibling fails are not deleted.
 */
@Injectable()
export class UploadCompleteSetUseCase {
  private readonly logger = new Logger(UploadCompleteSetUseCase.name);

  constructor(
    @Inject(VARIANT_IMAGE_ENCODER_PORT)
    private readonly encoder: VariantImageEncoderPort,
    @Inject(VARIANT_OBJECT_STORAGE_PORT)
    private readonly storage: VariantObjectStoragePort,
    @Inject(VARIANT_PIPELINE_CONFIG)
    private readonly config: VariantPipelineConfig,
  ) {}

  async execute(input: UploadCompleteSetInput): Promise<UploadCompleteSetResult> {
    const correlationId = ensureCorrelationId(input.correlationId);
    const bucket = requireBucketName(this.config);
    const context: VariantUploadContext = {
      bucket,
      prefix: input.prefix ?? this.config.objectKeyPrefix,
      ...this.resolveUploadName(input),
      source: input.source,
      correlationId,
    };

    try {
      await this.encoder.readSourceInfo(input.source);

      const references = await mapWithLimit(
        this.config.catalog,
        this.config.uploadConcurrency,
        (size) => this.uploadVariant(size, context),
      );
      const urls = assembleVariantUrlMap(references);

      this.logger.log(JSON.stringify(createJsonLogEntry({
        level: 'info',
        service: VARIANT_SERVICE_NAME,
        message: 'Stored complete variant set.',
        correlationId,
        uploadId: context.uploadId,
        bucket,
        metadata: {
          prefix: context.prefix,
          variants: references.map((reference) => reference.variantName),
        },
      })));

      return { uploadId: context.uploadId, urls, references };
    } catch (error) {
      this.logger.error(JSON.stringify(createJsonLogEntry({
        level: 'error',
        service: VARIANT_SERVICE_NAME,
        message: 'Variant set upload failed.',
        correlationId,
        uploadId: context.uploadId,
        variantName: isVariantPipelineError(error) ? error.variantName : undefined,
        bucket,
        error,
      })));
      throw error;
    }
  }

  private resolveUploadName(input: UploadCompleteSetInput): Pick<VariantUploadContext, 'uploadId' | 'baseFileName'> {
    if (input.keepSourceName && input.fileName) {
      const fileName = baseName(input.fileName);
      const name = stripExtension(fileName);
      if (name) {
        return { uploadId: name, baseFileName: fileName };
      }
    }
    const uploadId = generateId();
    return { uploadId, baseFileName: uploadId };
  }

  private async uploadVariant(size: SizeSpec, context: VariantUploadContext): Promise<UploadedReference> {
    const encoded = await this.encode(size, context.source);
    const fileName = buildVariantFileName({
      originalFileName: context.baseFileName,
      variantName: size.name,
      extension: encoded.extension,
      generateUnique: false,
    });
    const key = buildVariantObjectKey(context.prefix, fileName);

    try {
      const stored = await this.storage.putObject({
        bucket: context.bucket,
        key,
        body: encoded.buffer,
        contentType: encoded.contentType,
        cacheControl: cacheControlFor(this.config),
      });

      this.logger.debug(JSON.stringify(createJsonLogEntry({
        level: 'debug',
        service: VARIANT_SERVICE_NAME,
        message: 'Stored image variant.',
        correlationId: context.correlationId,
        uploadId: context.uploadId,
        variantName: size.name,
        bucket: context.bucket,
        objectKey: key,
        metadata: { width: encoded.width, height: encoded.height, sizeBytes: encoded.buffer.length },
      })));

      return {
        variantName: size.name,
        width: size.width,
        location: buildPublicUrl(stored, this.config.assetHost),
      };
    } catch (error) {
      if (isVariantPipelineError(error)) {
        throw error;
      }
      throw new StorageError(
        `Failed to store variant "${size.name}" at ${context.bucket}/${key}: ${describeCause(error)}`,
        { variantName: size.name, cause: error },
      );
    }
  }

  private async encode(size: SizeSpec, source: ImageSource): Promise<EncodedVariant> {
    try {
      return await this.encoder.encodeVariant({
        variantName: size.name,
        source,
        policy: { kind: 'width', width: size.width },
        options: this.config.encode,
      });
    } catch (error) {
      if (isVariantPipelineError(error)) {
        throw error;
      }
      throw new EncodeError(`Failed to encode variant "${size.name}": ${describeCause(error)}`, {
        variantName: size.name,
        cause: error,
      });
    }
  }
}
