import { baseName, buildVariantFileName, fileExtension, stripExtension } from './naming-policy';
import { cacheControlFor, type VariantPipelineConfig } from './pipeline-config';
import { listVersionNames } from './size-catalog';
import {
  outputContentType,
  outputExtension,
  resolveVariantPolicy,
  type ImageSource,
  type VariantPolicy,
} from './variant-encoding';

export interface UploadableFile {
  fileName: string;
  source: ImageSource;
}

export interface UploadObjectHeaders {
  contentType: string;
  cacheControl: string;
}

/**
 * What a caller must provide to have an image stored as a set of versions.
 * Extend {@link BaseUploadableDefinition} and override what differs.
 */
export interface UploadableDefinition {
  versions(): string[];
  validate(file: UploadableFile): boolean;
  storageDir(version: string, file: UploadableFile): string;
  /** File name without extension; the extension comes from the output format. */
  filename(version: string, file: UploadableFile): string;
  transform(version: string): VariantPolicy;
  objectHeaders(version: string, file: UploadableFile): UploadObjectHeaders;
}

export const DEFAULT_EXTENSION_WHITELIST = ['.jpg', '.jpeg', '.gif', '.png', '.webp', '.avif'] as const;

export interface BaseUploadableDefinitionOptions {
  storageDir?: string;
  extensionWhitelist?: readonly string[];
  uniqueFileNames?: boolean;
}

export class BaseUploadableDefinition implements UploadableDefinition {
  protected readonly extensionWhitelist: ReadonlySet<string>;

  constructor(
    protected readonly config: VariantPipelineConfig,
    protected readonly options: BaseUploadableDefinitionOptions = {},
  ) {
    this.extensionWhitelist = new Set(
      (options.extensionWhitelist ?? DEFAULT_EXTENSION_WHITELIST).map((value) => value.toLowerCase()),
    );
  }

  versions(): string[] {
    return listVersionNames(this.config.catalog);
  }

  validate(file: UploadableFile): boolean {
    return this.extensionWhitelist.has(fileExtension(file.fileName));
  }

  storageDir(_version: string, _file: UploadableFile): string {
    return this.options.storageDir ?? this.config.objectKeyPrefix;
  }

  filename(version: string, file: UploadableFile): string {
    const extension = this.extension();
    const name = buildVariantFileName({
      originalFileName: file.fileName,
      variantName: version,
      extension,
      generateUnique: this.options.uniqueFileNames ?? false,
    });
    return stripExtension(baseName(name));
  }

  transform(version: string): VariantPolicy {
    return resolveVariantPolicy(this.config.catalog, version);
  }

  objectHeaders(_version: string, _file: UploadableFile): UploadObjectHeaders {
    return {
      contentType: outputContentType(this.config.encode.outputFormat),
      cacheControl: cacheControlFor(this.config),
    };
  }

  extension(): string {
    return outputExtension(this.config.encode.outputFormat);
  }
}
