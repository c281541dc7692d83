import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Injectable } from '@nestjs/common';
import type {
  ReadSourceObjectResult,
  SourceObjectReaderPort,
} from '../../application/variants/ports/source-object-reader.port';
import type {
  PutVariantObjectInput,
  VariantObjectStoragePort,
} from '../../application/variants/ports/variant-object-storage.port';
import type { StoredReference } from '../../domain/variants/variant-url-map';

/**
 * Treats `bucket` as a root directory and `key` as a relative path below it.
 * HTTP headers have no filesystem counterpart and are dropped.
 */
@Injectable()
export class LocalFilesystemVariantStorageAdapter implements VariantObjectStoragePort, SourceObjectReaderPort {
  async readObject(bucket: string, objectKey: string): Promise<ReadSourceObjectResult> {
    return { buffer: await readFile(resolveWithinRoot(bucket, objectKey)) };
  }

  async putObject(input: PutVariantObjectInput): Promise<StoredReference> {
    const target = resolveWithinRoot(input.bucket, input.key);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, input.body);

    return {
      kind: 'location',
      key: input.key,
      location: target,
    };
  }
}

function resolveWithinRoot(root: string, key: string): string {
  const base = path.resolve(root);
  const target = path.resolve(base, key);
  if (target !== base && !target.startsWith(`${base}${path.sep}`)) {
    throw new Error(`Object key "${key}" escapes the storage root "${root}".`);
  }
  return target;
}
