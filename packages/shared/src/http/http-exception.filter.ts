import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { formatJsonLogLine } from '../logging/json-log.js';
import { generateId } from '../messaging/ids.js';

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

export interface ErrorResponseBody {
  detail: string;
}

export interface MappedHttpError {
  statusCode: number;
  detail: string;
}

/** Lets a service turn its own domain errors into a status code before the generic mapping runs. */
export type DomainErrorMapper = (exception: unknown) => MappedHttpError | undefined;

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  constructor(
    private readonly serviceName: string,
    private readonly mapDomainError: DomainErrorMapper = () => undefined,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<HttpRequestLike>();
    const response = ctx.getResponse<HttpResponseLike>();

    const correlationId = getCorrelationId(request);
    const normalized = this.mapDomainError(exception) ?? normalizeException(exception);
    const body: ErrorResponseBody = { detail: normalized.detail };

    response.setHeader('x-correlation-id', correlationId);
    response.status(normalized.statusCode).json(body);

    const level = normalized.statusCode >= 500 ? 'error' : 'warn';
    const logLine = formatJsonLogLine({
      level,
      service: this.serviceName,
      message: 'HTTP request failed.',
      correlationId,
      metadata: {
        method: request.method,
        path: request.originalUrl ?? request.url ?? '/',
        statusCode: normalized.statusCode,
        detail: normalized.detail,
      },
      error: normalized.statusCode >= 500 ? exception : undefined,
    });

    if (level === 'error') {
      this.logger.error(logLine);
    } else {
      this.logger.warn(logLine);
    }
  }
}

function getCorrelationId(request: HttpRequestLike): string {
  const header = request.headers['x-correlation-id'];
  if (Array.isArray(header) && header[0]?.trim()) {
    return header[0].trim();
  }
  if (typeof header === 'string' && header.trim()) {
    return header.trim();
  }
  return generateId();
}

export function normalizeException(exception: unknown): MappedHttpError {
  if (exception instanceof HttpException) {
    const statusCode = exception.getStatus();
    const response = exception.getResponse();

    if (typeof response === 'string') {
      return { statusCode, detail: response };
    }

    const message = typeof response === 'object' && response !== null && 'message' in response
      ? extractMessage(response.message)
      : undefined;

    return { statusCode, detail: message ?? (exception.message || 'Request failed.') };
  }

  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    detail: 'Internal server error',
  };
}

function extractMessage(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim()) {
    return value;
  }
  if (Array.isArray(value)) {
    const first: unknown = value.find((item) => typeof item === 'string' && item.trim());
    if (typeof first === 'string') {
      return first;
    }
  }
  return undefined;
}
