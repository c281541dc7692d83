export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  variantName?: string;
  stack?: string;
}

export interface JsonLogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  correlationId: string;
  uploadId?: string;
  variantName?: string;
  bucket?: string;
  objectKey?: string;
  metadata?: Record<string, unknown>;
  error?: SerializedError;
}

export interface CreateJsonLogEntryInput {
  level: LogLevel;
  service: string;
  message: string;
  correlationId: string;
  uploadId?: string;
  variantName?: string;
  bucket?: string;
  objectKey?: string;
  metadata?: Record<string, unknown>;
  error?: unknown;
  timestamp?: string;
}

export function serializeError(error: unknown): SerializedError | undefined {
  if (error == null) {
    return undefined;
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      code: readStringField(error, 'code'),
      variantName: readStringField(error, 'variantName'),
      stack: error.stack,
    };
  }

  if (typeof error === 'string') {
    return {
      name: 'Error',
      message: error,
    };
  }

  return {
    name: 'UnknownError',
    message: safeSerializeUnknown(error),
  };
}

function readStringField(error: Error, field: string): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === 'string' ? value : undefined;
}

function safeSerializeUnknown(value: unknown): string {
  try {
    const serialized = JSON.stringify(value);
    if (serialized !== undefined) {
      return serialized;
    }
  } catch {
    return String(value);
  }

  return String(value);
}

export function createJsonLogEntry(input: CreateJsonLogEntryInput): JsonLogEntry {
  return {
    timestamp: input.timestamp ?? new Date().toISOString(),
    level: input.level,
    service: input.service,
    message: input.message,
    correlationId: input.correlationId,
    uploadId: input.uploadId,
    variantName: input.variantName,
    bucket: input.bucket,
    objectKey: input.objectKey,
    metadata: input.metadata,
    error: serializeError(input.error),
  };
}
