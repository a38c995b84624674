import type { ProcessedLogDocument } from '../../../domain/processing/processed-log-document';

export const TENANT_STORE = Symbol('TENANT_STORE');

export interface StoredProcessedLog {
  logId: string;
  document: ProcessedLogDocument;
}

/**
 * Tenant-partitioned document store. Every call is scoped to exactly one tenant, and keys are
 * validated before any I/O.
 */
export interface TenantStore {
  /** Full replace: a second put for the same key leaves only the latest document. */
  put(tenantId: string, logId: string, document: ProcessedLogDocument): Promise<void>;
  get(tenantId: string, logId: string): Promise<ProcessedLogDocument | undefined>;
  list(tenantId: string): Promise<StoredProcessedLog[]>;
}
