export type VariantPipelineErrorCode =
  | 'CONFIG_ERROR'
  | 'DECODE_ERROR'
  | 'ENCODE_ERROR'
  | 'STORAGE_ERROR'
  | 'VALIDATION_ERROR';

export interface VariantPipelineErrorOptions {
  variantName?: string;
  cause?: unknown;
}

export abstract class VariantPipelineError extends Error {
  abstract readonly code: VariantPipelineErrorCode;
  readonly variantName?: string;

  protected constructor(message: string, options: VariantPipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.variantName = options.variantName;
  }
}

/** Required configuration is missing or a variant name is not in the catalog. */
export class ConfigError extends VariantPipelineError {
  readonly code = 'CONFIG_ERROR';

  constructor(message: string, options?: VariantPipelineErrorOptions) {
    super(message, options);
  }
}

export class DecodeError extends VariantPipelineError {
  readonly code = 'DECODE_ERROR';

  constructor(message: string, options?: VariantPipelineErrorOptions) {
    super(message, options);
  }
}

export class EncodeError extends VariantPipelineError {
  readonly code = 'ENCODE_ERROR';

  constructor(message: string, options?: VariantPipelineErrorOptions) {
    super(message, options);
  }
}

export class StorageError extends VariantPipelineError {
  readonly code = 'STORAGE_ERROR';

  constructor(message: string, options?: VariantPipelineErrorOptions) {
    super(message, options);
  }
}

/** Bad caller input (arguments, unsupported file extension). */
export class ValidationError extends VariantPipelineError {
  readonly code = 'VALIDATION_ERROR';

  constructor(message: string, options?: VariantPipelineErrorOptions) {
    super(message, options);
  }
}

export function isVariantPipelineError(error: unknown): error is VariantPipelineError {
  return error instanceof VariantPipelineError;
}

export function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
