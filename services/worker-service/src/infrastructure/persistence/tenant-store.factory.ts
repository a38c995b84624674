import { Client } from 'minio';
import { Pool } from 'pg';
import type { TenantStore } from '../../application/processing/ports/tenant-store.port';
import type { WorkerServiceConfigService } from '../config/worker-service-config.service';
import { InMemoryTenantStoreAdapter } from './in-memory-tenant-store.adapter';
import { MinioTenantStoreAdapter } from './minio-tenant-store.adapter';
import { PostgresTenantStoreAdapter } from './postgres-tenant-store.adapter';

export function createTenantStore(config: WorkerServiceConfigService): TenantStore {
  switch (config.tenantStoreDriver) {
    case 'memory':
      return new InMemoryTenantStoreAdapter();
    case 'postgres':
      return new PostgresTenantStoreAdapter(new Pool({
        connectionString: config.databaseUrl,
        max: 10,
        idleTimeoutMillis: 10_000,
      }));
    case 'minio':
      return new MinioTenantStoreAdapter(
        new Client({
          endPoint: config.minioEndpoint,
          port: config.minioApiPort,
          useSSL: config.minioUseSsl,
          accessKey: config.minioRootUser,
          secretKey: config.minioRootPassword,
          region: config.s3Region,
        }),
        config.tenantStoreBucket,
        config.s3Region,
      );
  }
}
