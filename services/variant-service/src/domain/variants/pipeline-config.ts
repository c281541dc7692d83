import { ConfigError } from './variant-errors';
import type { SizeCatalog } from './size-catalog';
import { buildCacheControl, type EncodeOptions } from './variant-encoding';

/**
 * Everything the pipeline reads from configuration, built once at startup and
 * handed to each component.
 */
export interface VariantPipelineConfig {
  catalog: SizeCatalog;
  encode: EncodeOptions;
  cacheMaxAgeSeconds: number;
  uploadConcurrency: number;
  objectKeyPrefix: string;
  bucket?: string;
  assetHost?: string;
}

export function requireBucketName(config: Pick<VariantPipelineConfig, 'bucket'>): string {
  const bucket = config.bucket?.trim();
  if (!bucket) {
    throw new ConfigError('No storage bucket configured (VARIANT_STORAGE_BUCKET).');
  }
  return bucket;
}

export function cacheControlFor(config: Pick<VariantPipelineConfig, 'cacheMaxAgeSeconds'>): string {
  return buildCacheControl(config.cacheMaxAgeSeconds);
}
