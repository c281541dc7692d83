import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { VariantPipelineConfig } from '../../domain/variants/pipeline-config';
import { parseSizeCatalog } from '../../domain/variants/size-catalog';
import { parseOutputFormat } from '../../domain/variants/variant-encoding';

const DEFAULTS = {
  port: 3010,
  sizes: 'xs:320,sm:768,md:1024,lg:1280,xl:1536',
  outputFormat: 'webp',
  cacheMaxAgeSeconds: 31_536_000,
  quality: 75,
  effort: 10,
  minimizeFileSize: true,
  stripMetadata: true,
  uploadConcurrency: 4,
  objectKeyPrefix: 'uploads',
  minioEndpoint: 'localhost',
  minioApiPort: 9000,
  minioUseSsl: false,
  minioRootUser: 'minioadmin',
  minioRootPassword: 'minioadmin',
  s3Region: 'us-east-1',
} as const;

export const VARIANT_SERVICE_ENV_FILE_PATHS = [
  '.env.local',
  '.env',
  '../../.env.local',
  '../../.env',
];

@Injectable()
export class VariantServiceConfigService {
  constructor(private readonly config: ConfigService) {}

  get port(): number {
    return this.config.get<number>('VARIANT_SERVICE_PORT', DEFAULTS.port);
  }

  get sizesCsv(): string {
    return this.config.get<string>('VARIANT_SIZES', DEFAULTS.sizes);
  }

  get outputFormat(): string {
    return this.config.get<string>('VARIANT_OUTPUT_FORMAT', DEFAULTS.outputFormat);
  }

  get cacheMaxAgeSeconds(): number {
    return this.config.get<number>('VARIANT_CACHE_MAX_AGE_SECONDS', DEFAULTS.cacheMaxAgeSeconds);
  }

  get quality(): number {
    return this.config.get<number>('VARIANT_QUALITY', DEFAULTS.quality);
  }

  get effort(): number {
    return this.config.get<number>('VARIANT_EFFORT', DEFAULTS.effort);
  }

  get minimizeFileSize(): boolean {
    return this.config.get<boolean>('VARIANT_MINIMIZE_FILE_SIZE', DEFAULTS.minimizeFileSize);
  }

  get stripMetadata(): boolean {
    return this.config.get<boolean>('VARIANT_STRIP_METADATA', DEFAULTS.stripMetadata);
  }

  get uploadConcurrency(): number {
    return this.config.get<number>('VARIANT_UPLOAD_CONCURRENCY', DEFAULTS.uploadConcurrency);
  }

  get objectKeyPrefix(): string {
    return this.config.get<string>('VARIANT_OBJECT_KEY_PREFIX', DEFAULTS.objectKeyPrefix);
  }

  /** Optional here; uploads fail with ConfigError when it is missing. */
  get storageBucket(): string | undefined {
    return this.config.get<string>('VARIANT_STORAGE_BUCKET');
  }

  get assetHost(): string | undefined {
    return this.config.get<string>('VARIANT_ASSET_HOST');
  }

  get minioEndpoint(): string {
    return this.config.get<string>('MINIO_ENDPOINT', DEFAULTS.minioEndpoint);
  }

  get minioApiPort(): number {
    return this.config.get<number>('MINIO_API_PORT', DEFAULTS.minioApiPort);
  }

  get minioUseSsl(): boolean {
    return this.config.get<boolean>('MINIO_USE_SSL', DEFAULTS.minioUseSsl);
  }

  get minioRootUser(): string {
    return this.config.get<string>('MINIO_ROOT_USER', DEFAULTS.minioRootUser);
  }

  get minioRootPassword(): string {
    return this.config.get<string>('MINIO_ROOT_PASSWORD', DEFAULTS.minioRootPassword);
  }

  get s3Region(): string {
    return this.config.get<string>('S3_REGION', DEFAULTS.s3Region);
  }

  toPipelineConfig(): VariantPipelineConfig {
    return {
      catalog: parseSizeCatalog(this.sizesCsv),
      encode: {
        outputFormat: parseOutputFormat(this.outputFormat),
        quality: this.quality,
        effort: this.effort,
        minimizeFileSize: this.minimizeFileSize,
        stripMetadata: this.stripMetadata,
      },
      cacheMaxAgeSeconds: this.cacheMaxAgeSeconds,
      uploadConcurrency: this.uploadConcurrency,
      objectKeyPrefix: this.objectKeyPrefix,
      bucket: this.storageBucket,
      assetHost: this.assetHost,
    };
  }
}

export function validateVariantServiceEnvironment(raw: Record<string, unknown>): Record<string, unknown> {
  const env = { ...raw };

  env.VARIANT_SERVICE_PORT = toPositiveInt(raw.VARIANT_SERVICE_PORT, DEFAULTS.port, 'VARIANT_SERVICE_PORT');
  env.VARIANT_SIZES = optionalString(raw.VARIANT_SIZES) ?? DEFAULTS.sizes;
  env.VARIANT_OUTPUT_FORMAT = optionalString(raw.VARIANT_OUTPUT_FORMAT) ?? DEFAULTS.outputFormat;
  env.VARIANT_CACHE_MAX_AGE_SECONDS = toNonNegativeInt(
    raw.VARIANT_CACHE_MAX_AGE_SECONDS,
    DEFAULTS.cacheMaxAgeSeconds,
    'VARIANT_CACHE_MAX_AGE_SECONDS',
  );
  env.VARIANT_QUALITY = toRangeInt(raw.VARIANT_QUALITY, DEFAULTS.quality, 1, 100, 'VARIANT_QUALITY');
  env.VARIANT_EFFORT = toRangeInt(raw.VARIANT_EFFORT, DEFAULTS.effort, 1, 10, 'VARIANT_EFFORT');
  env.VARIANT_MINIMIZE_FILE_SIZE = toBoolean(
    raw.VARIANT_MINIMIZE_FILE_SIZE,
    DEFAULTS.minimizeFileSize,
    'VARIANT_MINIMIZE_FILE_SIZE',
  );
  env.VARIANT_STRIP_METADATA = toBoolean(raw.VARIANT_STRIP_METADATA, DEFAULTS.stripMetadata, 'VARIANT_STRIP_METADATA');
  env.VARIANT_UPLOAD_CONCURRENCY = toPositiveInt(
    raw.VARIANT_UPLOAD_CONCURRENCY,
    DEFAULTS.uploadConcurrency,
    'VARIANT_UPLOAD_CONCURRENCY',
  );
  env.VARIANT_OBJECT_KEY_PREFIX = optionalString(raw.VARIANT_OBJECT_KEY_PREFIX) ?? DEFAULTS.objectKeyPrefix;
  env.VARIANT_STORAGE_BUCKET = optionalString(raw.VARIANT_STORAGE_BUCKET);
  env.VARIANT_ASSET_HOST = optionalString(raw.VARIANT_ASSET_HOST);
  env.MINIO_ENDPOINT = optionalString(raw.MINIO_ENDPOINT) ?? DEFAULTS.minioEndpoint;
  env.MINIO_API_PORT = toPositiveInt(raw.MINIO_API_PORT, DEFAULTS.minioApiPort, 'MINIO_API_PORT');
  env.MINIO_USE_SSL = toBoolean(raw.MINIO_USE_SSL, DEFAULTS.minioUseSsl, 'MINIO_USE_SSL');
  env.MINIO_ROOT_USER = optionalString(raw.MINIO_ROOT_USER) ?? DEFAULTS.minioRootUser;
  env.MINIO_ROOT_PASSWORD = optionalString(raw.MINIO_ROOT_PASSWORD) ?? DEFAULTS.minioRootPassword;
  env.S3_REGION = optionalString(raw.S3_REGION) ?? DEFAULTS.s3Region;

  // Fail at startup on catalog and format typos rather than on the first upload.
  parseSizeCatalog(String(env.VARIANT_SIZES));
  parseOutputFormat(String(env.VARIANT_OUTPUT_FORMAT));

  return env;
}

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const normalized = value.trim();
  return normalized ? normalized : undefined;
}

function toPositiveInt(value: unknown, fallback: number, name: string): number {
  const parsed = toNonNegativeInt(value, fallback, name);
  if (parsed <= 0) {
    throw new Error(`[variant-service] ${name} must be a positive integer.`);
  }
  return parsed;
}

function toNonNegativeInt(value: unknown, fallback: number, name: string): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  const parsed = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`[variant-service] ${name} must be a non-negative integer.`);
  }
  return Math.trunc(parsed);
}

function toRangeInt(value: unknown, fallback: number, min: number, max: number, name: string): number {
  const parsed = toPositiveInt(value, fallback, name);
  if (parsed < min || parsed > max) {
    throw new Error(`[variant-service] ${name} must be between ${min} and ${max}.`);
  }
  return parsed;
}

function toBoolean(value: unknown, fallback: boolean, name: string): boolean {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  const normalized = String(value).trim().toLowerCase();
  if (normalized === 'true') {
    return true;
  }
  if (normalized === 'false') {
    return false;
  }
  throw new Error(`[variant-service] ${name} must be "true" or "false".`);
}
