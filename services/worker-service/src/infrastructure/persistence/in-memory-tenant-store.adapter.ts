import type { StoredProcessedLog, TenantStore } from '../../application/processing/ports/tenant-store.port';
import type { ProcessedLogDocument } from '../../domain/processing/processed-log-document';
import { assertTenantId, buildProcessedLogPath } from '../../domain/tenancy/tenant-document-path';

/** Process-local store for local runs and tests. Keyed tenant first, so listing never crosses tenants. */
export class InMemoryTenantStoreAdapter implements TenantStore {
  private readonly tenants = new Map<string, Map<string, ProcessedLogDocument>>();

  async put(tenantId: string, logId: string, document: ProcessedLogDocument): Promise<void> {
    buildProcessedLogPath(tenantId, logId);

    let documents = this.tenants.get(tenantId);
    if (!documents) {
      documents = new Map();
      this.tenants.set(tenantId, documents);
    }
    documents.set(logId, { ...document });
  }

  async get(tenantId: string, logId: string): Promise<ProcessedLogDocument | undefined> {
    buildProcessedLogPath(tenantId, logId);
    const document = this.tenants.get(tenantId)?.get(logId);
    return document ? { ...document } : undefined;
  }

  async list(tenantId: string): Promise<StoredProcessedLog[]> {
    assertTenantId(tenantId);
    const documents = this.tenants.get(tenantId);
    if (!documents) {
      return [];
    }

    return [...documents.entries()].map(([logId, document]) => ({ logId, document: { ...document } }));
  }
}
