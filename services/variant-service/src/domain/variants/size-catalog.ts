import { ConfigError } from './variant-errors';

export interface SizeSpec {
  readonly name: string;
  readonly width: number;
}

export type SizeCatalog = readonly SizeSpec[];

export type SizeCatalogInput =
  | ReadonlyArray<readonly [string, number] | SizeSpec>
  | Readonly<Record<string, number>>;

export const ORIGINAL_VERSION = 'original';
export const THUMBNAIL_VERSION = 'thumbnail';
export const THUMBNAIL_WIDTH = 320;

export const DEFAULT_SIZE_CATALOG: SizeCatalog = Object.freeze([
  Object.freeze({ name: 'xs', width: 320 }),
  Object.freeze({ name: 'sm', width: 768 }),
  Object.freeze({ name: 'md', width: 1024 }),
  Object.freeze({ name: 'lg', width: 1280 }),
  Object.freeze({ name: 'xl', width: 1536 }),
]);

/**
 * Resolves configured sizes into an ordered, validated catalog. Absent or
 * empty input falls back to {@link DEFAULT_SIZE_CATALOG}.
 */
export function resolveSizeCatalog(raw?: SizeCatalogInput | null): SizeCatalog {
  const entries = toEntries(raw);
  if (entries.length === 0) {
    return DEFAULT_SIZE_CATALOG;
  }

  const seen = new Set<string>();
  const catalog: SizeSpec[] = [];

  for (const [rawName, width] of entries) {
    const name = rawName.trim();
    if (!name) {
      throw new ConfigError('Size catalog entries must have a non-empty name.');
    }
    if (seen.has(name)) {
      throw new ConfigError(`Size catalog contains duplicate variant "${name}".`);
    }
    if (!Number.isInteger(width) || width <= 0) {
      throw new ConfigError(`Variant "${name}" must have a positive integer width, got ${width}.`);
    }

    seen.add(name);
    catalog.push(Object.freeze({ name, width }));
  }

  return Object.freeze(catalog);
}

/** Parses `xs:320,sm:768` style configuration, keeping the written order. */
export function parseSizeCatalog(raw: string | undefined): SizeCatalog {
  if (!raw || raw.trim().length === 0) {
    return DEFAULT_SIZE_CATALOG;
  }

  const entries = raw
    .split(',')
    .map((value) => value.trim())
    .filter((value) => value.length > 0)
    .map((value): [string, number] => {
      const [name = '', width = ''] = value.split(':').map((part) => part.trim());
      if (!name || !/^\d+$/.test(width)) {
        throw new ConfigError(`Invalid size catalog entry "${value}", expected "name:width".`);
      }
      return [name, Number.parseInt(width, 10)];
    });

  return resolveSizeCatalog(entries);
}

export function getWidthFromSize(catalog: SizeCatalog, name: string): number {
  const entry = catalog.find((entry) => entry.name === name);
  if (!entry) {
    throw new ConfigError(`Variant "${name}" is not part of the size catalog.`, { variantName: name });
  }
  return entry.width;
}

export function hasSize(catalog: SizeCatalog, name: string): boolean {
  return catalog.some((entry) => entry.name === name);
}

/** All storable versions: the two pseudo-variants followed by the catalog names. */
export function listVersionNames(catalog: SizeCatalog): string[] {
  return Array.from(
    new Set([ORIGINAL_VERSION, THUMBNAIL_VERSION, ...catalog.map((entry) => entry.name)]),
  );
}

/** First entry with the maximum width, in catalog order. */
export function largestSize<T extends Pick<SizeSpec, 'width'>>(entries: readonly T[]): T {
  return pickBy(entries, (candidate, current) => candidate.width > current.width);
}

/** First entry with the minimum width, in catalog order. */
export function smallestSize<T extends Pick<SizeSpec, 'width'>>(entries: readonly T[]): T {
  return pickBy(entries, (candidate, current) => candidate.width < current.width);
}

function pickBy<T extends Pick<SizeSpec, 'width'>>(
  entries: readonly T[],
  isBetter: (candidate: T, current: T) => boolean,
): T {
  const [first, ...rest] = entries;
  if (!first) {
    throw new ConfigError('Size catalog is empty.');
  }
  return rest.reduce((current, candidate) => (isBetter(candidate, current) ? candidate : current), first);
}

function toEntries(raw: SizeCatalogInput | null | undefined): Array<readonly [string, number]> {
  if (!raw) {
    return [];
  }

  if (isEntryList(raw)) {
    return raw.map((entry) => (isSizeSpec(entry) ? [entry.name, entry.width] as const : entry));
  }

  return Object.entries(raw);
}

function isEntryList(
  raw: SizeCatalogInput,
): raw is ReadonlyArray<readonly [string, number] | SizeSpec> {
  return Array.isArray(raw);
}

function isSizeSpec(entry: readonly [string, number] | SizeSpec): entry is SizeSpec {
  return !Array.isArray(entry);
}
