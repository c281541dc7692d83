import { Inject, Injectable, Logger } from '@nestjs/common';
import { createJsonLogEntry, ensureCorrelationId, mapWithLimit } from '@image-variants/shared';
import { buildVariantObjectKey } from '../../domain/variants/naming-policy';
import { requireBucketName } from '../../domain/variants/pipeline-config';
import type { UploadableDefinition, UploadableFile } from '../../domain/variants/uploadable';
import {
  EncodeError,
  StorageError,
  ValidationError,
  describeCause,
  isVariantPipelineError,
} from '../../domain/variants/variant-errors';
import { buildPublicUrl } from '../../domain/variants/variant-url-map';
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

export type StoredVersionUrls = Readonly<Record<string, string>>;

@Injectable()
export class StoreUploadableVersionsUseCase {
  private readonly logger = new Logger(StoreUploadableVersionsUseCase.name);

  constructor(
    @Inject(VARIANT_IMAGE_ENCODER_PORT)
    private readonly encoder: VariantImageEncoderPort,
    @Inject(VARIANT_OBJECT_STORAGE_PORT)
    private readonly storage: VariantObjectStoragePort,
    @Inject(VARIANT_PIPELINE_CONFIG)
    private readonly config: VariantPipelineConfig,
  ) {}

  async execute(
    definition: UploadableDefinition,
    file: UploadableFile,
    correlationId?: string,
  ): Promise<StoredVersionUrls> {
    const traceId = ensureCorrelationId(correlationId);
    const bucket = requireBucketName(this.config);

    if (!definition.validate(file)) {
      throw new ValidationError(`File "${file.fileName}" was rejected by the upload definition.`);
    }

    await this.encoder.readSourceInfo(file.source);

    const versions = definition.versions();
    const entries = await mapWithLimit(versions, this.config.uploadConcurrency, async (version) => {
      const url = await this.storeVersion(definition, file, version, bucket);
      return [version, url] as const;
    });

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: VARIANT_SERVICE_NAME,
      message: 'Stored uploadable versions.',
      correlationId: traceId,
      bucket,
      metadata: { fileName: file.fileName, versions },
    })));

    return Object.freeze(Object.fromEntries(entries));
  }

  private async storeVersion(
    definition: UploadableDefinition,
    file: UploadableFile,
    version: string,
    bucket: string,
  ): Promise<string> {
    const encoded = await this.encodeVersion(definition, file, version);

    const key = buildVariantObjectKey(
      definition.storageDir(version, file),
      `${definition.filename(version, file)}.${encoded.extension}`,
    );
    const headers = definition.objectHeaders(version, file);

    try {
      const stored = await this.storage.putObject({
        bucket,
        key,
        body: encoded.buffer,
        contentType: headers.contentType,
        cacheControl: headers.cacheControl,
      });
      return buildPublicUrl(stored, this.config.assetHost);
    } catch (error) {
      if (isVariantPipelineError(error)) {
        throw error;
      }
      throw new StorageError(
        `Failed to store version "${version}" at ${bucket}/${key}: ${describeCause(error)}`,
        { variantName: version, cause: error },
      );
    }
  }

  private async encodeVersion(
    definition: UploadableDefinition,
    file: UploadableFile,
    version: string,
  ): Promise<EncodedVariant> {
    try {
      return await this.encoder.encodeVariant({
        variantName: version,
        source: file.source,
        policy: definition.transform(version),
        options: this.config.encode,
      });
    } catch (error) {
      if (isVariantPipelineError(error)) {
        throw error;
      }
      throw new EncodeError(`Failed to encode version "${version}": ${describeCause(error)}`, {
        variantName: version,
        cause: error,
      });
    }
  }
}
