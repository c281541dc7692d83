import { largestSize, smallestSize } from './size-catalog';
import { ConfigError } from './variant-errors';

export type StoredReference =
  | {
      kind: 'location';
      key: string;
      /** Ready-made URL or filesystem path. */
      location: string;
    }
  | {
      kind: 'object';
      key: string;
      scheme: string;
      host: string;
      bucket: string;
    };

export interface UploadedReference {
  variantName: string;
  width: number;
  location: string;
}

export const DEFAULT_URL_KEY = 'default';
export const THUMBNAIL_URL_KEY = 'thumbnail';

export type VariantUrlMap = Readonly<Record<string, string>>;

/**
 * Asset host wins over everything else; otherwise a stored location is used
 * as is and object references become `{scheme}{host}/{bucket}/{key}`.
 */
export function buildPublicUrl(reference: StoredReference, assetHost?: string): string {
  if (assetHost) {
    return `${assetHost.replace(/\/+$/, '')}/${reference.key}`;
  }

  if (reference.kind === 'location') {
    return reference.location;
  }

  return `${reference.scheme}${reference.host}/${reference.bucket}/${reference.key}`;
}

/**
 * Builds the width-keyed URL map with `default` pointing at the widest entry
 * and `thumbnail` at the narrowest. `references` must be in catalog order:
 * ties (and duplicate widths) resolve to the first entry.
 */
export function assembleVariantUrlMap(references: readonly UploadedReference[]): VariantUrlMap {
  if (references.length === 0) {
    throw new ConfigError('Cannot assemble a URL map from an empty size catalog.');
  }

  const urls: Record<string, string> = {};
  for (const reference of references) {
    const key = String(reference.width);
    if (!(key in urls)) {
      urls[key] = reference.location;
    }
  }

  urls[DEFAULT_URL_KEY] = largestSize(references).location;
  urls[THUMBNAIL_URL_KEY] = smallestSize(references).location;

  return Object.freeze(urls);
}
