import { getWidthFromSize, type SizeCatalog } from './size-catalog';

export interface PictureSource {
  media: string;
  srcset: string;
  width: number;
}

export interface PictureSources {
  sources: PictureSource[];
  src: string;
  zoomSrc: string;
}

export interface BuildPictureSourcesInput {
  catalog: SizeCatalog;
  /** Catalog names to emit as `<source>` entries, in display order. */
  versions: readonly string[];
  /** Version used for the fallback `<img src>`. */
  base: string;
  zoomVersion?: string;
  urlFor: (version: string) => string;
}

export function buildPictureSources(input: BuildPictureSourcesInput): PictureSources {
  const sources = input.versions.map((version) => {
    const width = getWidthFromSize(input.catalog, version);
    return {
      media: `(max-width: ${width}px)`,
      srcset: input.urlFor(version),
      width,
    };
  });

  const src = input.urlFor(input.base);

  return {
    sources,
    src,
    zoomSrc: input.zoomVersion ? input.urlFor(input.zoomVersion) : src,
  };
}
