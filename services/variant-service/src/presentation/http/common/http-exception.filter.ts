import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { createJsonLogEntry, ensureCorrelationId } from '@image-variants/shared';
import { VARIANT_SERVICE_NAME } from '../../../application/system/service-info.query';
import {
  isVariantPipelineError,
  type VariantPipelineErrorCode,
} from '../../../domain/variants/variant-errors';

interface HttpRequestLike {
  headers: Record<string, string | string[] | undefined>;
  originalUrl?: string;
  url?: string;
  method: string;
}

interface HttpResponseLike {
  setHeader(name: string, value: string): void;
  status(code: number): HttpResponseLike;
  json(body: unknown): void;
}

interface ErrorResponseBody {
  error: {
    code: string;
    message: string;
    variantName?: string;
  };
  statusCode: number;
  path: string;
  method: string;
  timestamp: string;
  correlationId: string;
}

interface NormalizedException {
  statusCode: number;
  code: string;
  message: string;
  variantName?: string;
}

const PIPELINE_ERROR_STATUS: Record<VariantPipelineErrorCode, number> = {
  VALIDATION_ERROR: HttpStatus.BAD_REQUEST,
  DECODE_ERROR: HttpStatus.UNPROCESSABLE_ENTITY,
  ENCODE_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
  STORAGE_ERROR: HttpStatus.BAD_GATEWAY,
  CONFIG_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<HttpRequestLike>();
    const response = ctx.getResponse<HttpResponseLike>();

    const correlationId = this.getCorrelationId(request);
    const normalized = normalizeException(exception);
    const body: ErrorResponseBody = {
      error: {
        code: normalized.code,
        message: normalized.message,
        ...(normalized.variantName === undefined ? {} : { variantName: normalized.variantName }),
      },
      statusCode: normalized.statusCode,
      path: request.originalUrl ?? request.url ?? '/',
      method: request.method,
      timestamp: new Date().toISOString(),
      correlationId,
    };

    response.setHeader('x-correlation-id', correlationId);
    response.status(normalized.statusCode).json(body);

    const level = normalized.statusCode >= 500 ? 'error' : 'warn';
    const logLine = JSON.stringify(createJsonLogEntry({
      level,
      service: VARIANT_SERVICE_NAME,
      message: 'HTTP request failed.',
      correlationId,
      variantName: normalized.variantName,
      metadata: {
        method: body.method,
        path: body.path,
        statusCode: body.statusCode,
        errorCode: body.error.code,
      },
      error: normalized.statusCode >= 500 ? exception : undefined,
    }));

    if (level === 'error') {
      this.logger.error(logLine);
    } else {
      this.logger.warn(logLine);
    }
  }

  private getCorrelationId(request: HttpRequestLike): string {
    const header = request.headers['x-correlation-id'];
    return ensureCorrelationId(Array.isArray(header) ? header[0] : header);
  }
}

export function normalizeException(exception: unknown): NormalizedException {
  if (isVariantPipelineError(exception)) {
    const statusCode = PIPELINE_ERROR_STATUS[exception.code];
    return {
      statusCode,
      code: exception.code,
      // configuration and encoder details stay in the logs
      message: statusCode >= 500 && exception.code !== 'STORAGE_ERROR' ? 'Image processing failed.' : exception.message,
      variantName: exception.variantName,
    };
  }

  if (exception instanceof HttpException) {
    const statusCode = exception.getStatus();
    return {
      statusCode,
      code: defaultCodeForStatus(statusCode),
      message: exception.message || 'Request failed.',
    };
  }

  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    code: 'INTERNAL_SERVER_ERROR',
    message: 'Unexpected server error.',
  };
}

function defaultCodeForStatus(statusCode: number): string {
  switch (statusCode) {
    case HttpStatus.BAD_REQUEST:
      return 'BAD_REQUEST';
    case HttpStatus.NOT_FOUND:
      return 'NOT_FOUND';
    case HttpStatus.PAYLOAD_TOO_LARGE:
      return 'PAYLOAD_TOO_LARGE';
    case HttpStatus.UNPROCESSABLE_ENTITY:
      return 'UNPROCESSABLE_ENTITY';
    default:
      return statusCode >= 500 ? 'INTERNAL_SERVER_ERROR' : 'HTTP_ERROR';
  }
}
