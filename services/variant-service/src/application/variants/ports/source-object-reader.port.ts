export const SOURCE_OBJECT_READER_PORT = Symbol('SOURCE_OBJECT_READER_PORT');

export interface ReadSourceObjectResult {
  buffer: Buffer;
  contentType?: string;
}

export interface SourceObjectReaderPort {
  readObject(bucket: string, objectKey: string): Promise<ReadSourceObjectResult>;
}
