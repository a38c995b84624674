import { HttpStatus } from '@nestjs/common';
import type { MappedHttpError } from '@log-ingest/shared';
import { TenantKeyError } from '../../../domain/tenancy/tenant-document-path';

export function mapWorkerDomainError(exception: unknown): MappedHttpError | undefined {
  if (exception instanceof TenantKeyError) {
    return { statusCode: HttpStatus.BAD_REQUEST, detail: exception.message };
  }
  return undefined;
}
