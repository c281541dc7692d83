export const JSON_LOG_STANDARD = {
  format: 'json',
  requiredFields: [
    'timestamp',
    'level',
    'service',
    'message',
    'correlationId',
  ],
  optionalTraceFields: [
    'uploadId',
    'variantName',
    'bucket',
    'objectKey',
    'error',
  ],
} as const;

export const SYSTEM_CORRELATION_ID = 'system';
