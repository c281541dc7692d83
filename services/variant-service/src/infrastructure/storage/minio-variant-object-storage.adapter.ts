import { Injectable } from '@nestjs/common';
import { Client } from 'minio';
import type {
  ReadSourceObjectResult,
  SourceObjectReaderPort,
} from '../../application/variants/ports/source-object-reader.port';
import type {
  PutVariantObjectInput,
  VariantObjectStoragePort,
} from '../../application/variants/ports/variant-object-storage.port';
import type { StoredReference } from '../../domain/variants/variant-url-map';
import { VariantServiceConfigService } from '../config/variant-service-config.service';

@Injectable()
export class MinioVariantObjectStorageAdapter implements VariantObjectStoragePort, SourceObjectReaderPort {
  private readonly client: Client;

  constructor(private readonly config: VariantServiceConfigService) {
    this.client = new Client({
      endPoint: config.minioEndpoint,
      port: config.minioApiPort,
      useSSL: config.minioUseSsl,
      accessKey: config.minioRootUser,
      secretKey: config.minioRootPassword,
      region: config.s3Region,
    });
  }

  async readObject(bucket: string, objectKey: string): Promise<ReadSourceObjectResult> {
    const stream = await this.client.getObject(bucket, objectKey);
    const chunks: Buffer[] = [];

    await new Promise<void>((resolve, reject) => {
      stream.on('data', (chunk: Buffer | string) => {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
      });
      stream.on('end', () => resolve());
      stream.on('error', (error: unknown) => reject(error));
    });

    return {
      buffer: Buffer.concat(chunks),
    };
  }

  async putObject(input: PutVariantObjectInput): Promise<StoredReference> {
    await this.client.putObject(input.bucket, input.key, input.body, input.body.length, {
      'Content-Type': input.contentType,
      'Cache-Control': input.cacheControl,
    });

    return {
      kind: 'object',
      key: input.key,
      scheme: this.config.minioUseSsl ? 'https://' : 'http://',
      host: buildHost(this.config.minioEndpoint, this.config.minioApiPort, this.config.minioUseSsl),
      bucket: input.bucket,
    };
  }
}

function buildHost(endpoint: string, port: number, useSsl: boolean): string {
  const defaultPort = useSsl ? 443 : 80;
  return port === defaultPort ? endpoint : `${endpoint}:${port}`;
}
