import { Inject, Injectable, NotFoundException } from '@nestjs/common';
import type { ProcessedLogDocument } from '../../domain/processing/processed-log-document';
import { assertLogId, assertTenantId } from '../../domain/tenancy/tenant-document-path';
import { TENANT_STORE, type TenantStore } from '../processing/ports/tenant-store.port';

export interface ProcessedLogView extends ProcessedLogDocument {
  log_id: string;
}

export interface ProcessedLogListView {
  tenant_id: string;
  count: number;
  items: ProcessedLogView[];
}

@Injectable()
export class ProcessedLogsQuery {
  constructor(
    @Inject(TENANT_STORE)
    private readonly tenantStore: TenantStore,
  ) {}

  async list(tenantId: string): Promise<ProcessedLogListView> {
    assertTenantId(tenantId);
    const stored = await this.tenantStore.list(tenantId);
    const items = stored
      .map(({ logId, document }) => ({ log_id: logId, ...document }))
      .sort((left, right) => left.log_id.localeCompare(right.log_id));

    return { tenant_id: tenantId, count: items.length, items };
  }

  async get(tenantId: string, logId: string): Promise<ProcessedLogView> {
    assertTenantId(tenantId);
    assertLogId(logId);

    const document = await this.tenantStore.get(tenantId, logId);
    if (!document) {
      throw new NotFoundException(`No processed log ${logId} for tenant ${tenantId}`);
    }

    return { log_id: logId, ...document };
  }
}
