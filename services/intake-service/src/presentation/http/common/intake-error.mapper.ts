import { HttpStatus } from '@nestjs/common';
import type { MappedHttpError } from '@log-ingest/shared';
import { ValidationError } from '../../../domain/ingest/validation.error';

export function mapIntakeDomainError(exception: unknown): MappedHttpError | undefined {
  if (exception instanceof ValidationError) {
    return { statusCode: HttpStatus.BAD_REQUEST, detail: exception.message };
  }
  return undefined;
}
