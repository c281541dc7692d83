import { ConfigError } from './variant-errors';
import {
  ORIGINAL_VERSION,
  THUMBNAIL_VERSION,
  THUMBNAIL_WIDTH,
  getWidthFromSize,
  type SizeCatalog,
} from './size-catalog';

export const OUTPUT_FORMATS = ['webp', 'avif', 'jpeg', 'png', 'gif'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Encoded bytes or a path the codec can open. Never modified by the pipeline. */
export type ImageSource = Buffer | string;

export interface EncodeOptions {
  outputFormat: OutputFormat;
  /** 1..100 */
  quality: number;
  /** 1..10, rescaled per codec by the encoder. */
  effort: number;
  minimizeFileSize: boolean;
  stripMetadata: boolean;
}

export type VariantPolicy =
  | { kind: 'original' }
  | { kind: 'thumbnail' }
  | { kind: 'width'; width: number };

export const DEFAULT_ENCODE_OPTIONS: EncodeOptions = {
  outputFormat: 'webp',
  quality: 75,
  effort: 10,
  minimizeFileSize: true,
  stripMetadata: true,
};

export function parseOutputFormat(raw: string | undefined, fallback: OutputFormat = 'webp'): OutputFormat {
  if (!raw || raw.trim().length === 0) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase().replace(/^\./, '');
  const format = normalized === 'jpg' ? 'jpeg' : normalized;
  const match = OUTPUT_FORMATS.find((candidate) => candidate === format);
  if (!match) {
    throw new ConfigError(
      `Unsupported output format "${raw}". Expected one of: ${OUTPUT_FORMATS.join(', ')}, jpg.`,
    );
  }
  return match;
}

export function outputExtension(format: OutputFormat): string {
  return format === 'jpeg' ? 'jpg' : format;
}

export function outputContentType(format: OutputFormat): string {
  return `image/${format}`;
}

export function buildCacheControl(maxAgeSeconds: number): string {
  return `public, max-age=${maxAgeSeconds}`;
}

/**
 * Maps a version name to its encode policy: `original` and `thumbnail` are
 * fixed policies, everything else is looked up in the catalog.
 */
export function resolveVariantPolicy(catalog: SizeCatalog, version: string): VariantPolicy {
  if (version === ORIGINAL_VERSION) {
    return { kind: 'original' };
  }
  if (version === THUMBNAIL_VERSION) {
    return { kind: 'thumbnail' };
  }
  return { kind: 'width', width: getWidthFromSize(catalog, version) };
}

export function describePolicy(policy: VariantPolicy): string {
  switch (policy.kind) {
    case 'original':
      return 'original';
    case 'thumbnail':
      return `thumbnail(${THUMBNAIL_WIDTH})`;
    case 'width':
      return `width(${policy.width})`;
  }
}
