import type { StoredReference } from '../../../domain/variants/variant-url-map';

export const VARIANT_OBJECT_STORAGE_PORT = Symbol('VARIANT_OBJECT_STORAGE_PORT');

export interface PutVariantObjectInput {
  bucket: string;
  key: string;
  body: Buffer;
  contentType: string;
  cacheControl: string;
}

export interface VariantObjectStoragePort {
  putObject(input: PutVariantObjectInput): Promise<StoredReference>;
}
