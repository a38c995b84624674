import { Logger, OnModuleDestroy } from '@nestjs/common';
import { formatJsonLogLine } from '@log-ingest/shared';
import type { Pool } from 'pg';
import type { StoredProcessedLog, TenantStore } from '../../application/processing/ports/tenant-store.port';
import {
  isProcessedLogDocument,
  type ProcessedLogDocument,
} from '../../domain/processing/processed-log-document';
import {
  buildProcessedLogPath,
  buildTenantPrefix,
  logIdFromPath,
} from '../../domain/tenancy/tenant-document-path';

interface DocumentRow {
  document_path: string;
  body: unknown;
}

/** Schema: `sql/001_tenant_store.sql`. */
export class PostgresTenantStoreAdapter implements TenantStore, OnModuleDestroy {
  private readonly logger = new Logger(PostgresTenantStoreAdapter.name);

  constructor(private readonly pool: Pool) {
    this.pool.on('error', (error: unknown) => {
      this.logger.error(formatJsonLogLine({
        level: 'error',
        service: 'worker-service',
        message: 'Postgres pool error in tenant store.',
        error,
      }));
    });
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }

  async put(tenantId: string, logId: string, document: ProcessedLogDocument): Promise<void> {
    const documentPath = buildProcessedLogPath(tenantId, logId);

    await this.pool.query(
      `
        insert into tenant_store.documents (document_path, body, written_at)
        values ($1, $2::jsonb, now())
        on conflict (document_path) do update
          set body = excluded.body,
              written_at = excluded.written_at
      `,
      [documentPath, JSON.stringify(document)],
    );
  }

  async get(tenantId: string, logId: string): Promise<ProcessedLogDocument | undefined> {
    const documentPath = buildProcessedLogPath(tenantId, logId);
    const result = await this.pool.query<DocumentRow>(
      'select document_path, body from tenant_store.documents where document_path = $1',
      [documentPath],
    );

    const [row] = result.rows;
    return row ? toDocument(row) : undefined;
  }

  async list(tenantId: string): Promise<StoredProcessedLog[]> {
    const prefix = buildTenantPrefix(tenantId);
    const result = await this.pool.query<DocumentRow>(
      `
        select document_path, body
        from tenant_store.documents
        where starts_with(document_path, $1)
        order by document_path
      `,
      [prefix],
    );

    const items: StoredProcessedLog[] = [];
    for (const row of result.rows) {
      const logId = logIdFromPath(tenantId, row.document_path);
      if (logId) {
        items.push({ logId, document: toDocument(row) });
      }
    }
    return items;
  }
}

function toDocument(row: DocumentRow): ProcessedLogDocument {
  if (!isProcessedLogDocument(row.body)) {
    throw new Error(`Stored body at ${row.document_path} is not a processed log document.`);
  }
  return row.body;
}
