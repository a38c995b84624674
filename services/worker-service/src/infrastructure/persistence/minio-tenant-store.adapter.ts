import { Logger, OnModuleInit } from '@nestjs/common';
import { formatJsonLogLine, isRecord } from '@log-ingest/shared';
import type { Client } from 'minio';
import type { Readable } from 'node:stream';
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

const OBJECT_SUFFIX = '.json';

export function buildObjectKey(tenantId: string, logId: string): string {
  return `${buildProcessedLogPath(tenantId, logId)}${OBJECT_SUFFIX}`;
}

/** One JSON object per processed log; `putObject` on an existing key replaces it whole. */
export class MinioTenantStoreAdapter implements TenantStore, OnModuleInit {
  private readonly logger = new Logger(MinioTenantStoreAdapter.name);

  constructor(
    private readonly client: Client,
    private readonly bucket: string,
    private readonly region: string,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.ensureBucket();
  }

  async ensureBucket(): Promise<void> {
    if (await this.client.bucketExists(this.bucket)) {
      return;
    }

    await this.client.makeBucket(this.bucket, this.region);
    this.logger.log(formatJsonLogLine({
      level: 'info',
      service: 'worker-service',
      message: `Created tenant store bucket "${this.bucket}".`,
      metadata: { bucket: this.bucket, region: this.region },
    }));
  }

  async put(tenantId: string, logId: string, document: ProcessedLogDocument): Promise<void> {
    const body = Buffer.from(JSON.stringify(document), 'utf-8');
    await this.client.putObject(this.bucket, buildObjectKey(tenantId, logId), body, body.length, {
      'Content-Type': 'application/json',
    });
  }

  async get(tenantId: string, logId: string): Promise<ProcessedLogDocument | undefined> {
    return this.readDocument(buildObjectKey(tenantId, logId));
  }

  async list(tenantId: string): Promise<StoredProcessedLog[]> {
    const objectNames = await this.listObjectNames(buildTenantPrefix(tenantId));
    const items: StoredProcessedLog[] = [];

    for (const objectName of objectNames) {
      if (!objectName.endsWith(OBJECT_SUFFIX)) {
        continue;
      }

      const logId = logIdFromPath(tenantId, objectName.slice(0, -OBJECT_SUFFIX.length));
      if (!logId) {
        continue;
      }

      // Deleted between listing and reading.
      const document = await this.readDocument(objectName);
      if (document) {
        items.push({ logId, document });
      }
    }

    return items;
  }

  private async readDocument(objectKey: string): Promise<ProcessedLogDocument | undefined> {
    let stream: Readable;
    try {
      stream = await this.client.getObject(this.bucket, objectKey);
    } catch (error) {
      if (isNoSuchKeyError(error)) {
        return undefined;
      }
      throw error;
    }

    const parsed: unknown = JSON.parse((await readStream(stream)).toString('utf-8'));
    if (!isProcessedLogDocument(parsed)) {
      throw new Error(`Object ${objectKey} in bucket ${this.bucket} is not a processed log document.`);
    }
    return parsed;
  }

  private async listObjectNames(prefix: string): Promise<string[]> {
    const stream = this.client.listObjectsV2(this.bucket, prefix, true);
    const names: string[] = [];

    await new Promise<void>((resolve, reject) => {
      stream.on('data', (item: unknown) => {
        if (isRecord(item) && typeof item.name === 'string') {
          names.push(item.name);
        }
      });
      stream.on('end', () => resolve());
      stream.on('error', (error: unknown) => reject(error));
    });

    return names;
  }
}

async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];

  await new Promise<void>((resolve, reject) => {
    stream.on('data', (chunk: Buffer | string) => {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    });
    stream.on('end', () => resolve());
    stream.on('error', (error: unknown) => reject(error));
  });

  return Buffer.concat(chunks);
}

function isNoSuchKeyError(error: unknown): boolean {
  return isRecord(error) && (error.code === 'NoSuchKey' || error.code === 'NotFound');
}
