import { isValidLogId, isValidTenantId, LOG_ID_RULE, TENANT_ID_RULE } from '@log-ingest/shared';

export const TENANTS_ROOT = 'tenants';
export const PROCESSED_LOGS_COLLECTION = 'processed_logs';

export class TenantKeyError extends Error {
  constructor(
    readonly field: 'tenant_id' | 'log_id',
    message: string,
  ) {
    super(message);
    this.name = 'TenantKeyError';
  }
}

export function assertTenantId(tenantId: string): string {
  if (!isValidTenantId(tenantId)) {
    throw new TenantKeyError('tenant_id', `Invalid tenant_id "${tenantId}": use ${TENANT_ID_RULE}`);
  }
  return tenantId;
}

export function assertLogId(logId: string): string {
  if (!isValidLogId(logId)) {
    throw new TenantKeyError('log_id', `Invalid log_id "${logId}": use ${LOG_ID_RULE}`);
  }
  return logId;
}

/** Always ends in '/', so the prefix for `acme` never matches documents of `acme2`. */
export function buildTenantPrefix(tenantId: string): string {
  return `${TENANTS_ROOT}/${assertTenantId(tenantId)}/${PROCESSED_LOGS_COLLECTION}/`;
}

export function buildProcessedLogPath(tenantId: string, logId: string): string {
  return `${buildTenantPrefix(tenantId)}${assertLogId(logId)}`;
}

/** Inverse of {@link buildProcessedLogPath} for one tenant; undefined for paths outside the prefix. */
export function logIdFromPath(tenantId: string, path: string): string | undefined {
  const prefix = buildTenantPrefix(tenantId);
  if (!path.startsWith(prefix)) {
    return undefined;
  }

  const logId = path.slice(prefix.length);
  return isValidLogId(logId) ? logId : undefined;
}
