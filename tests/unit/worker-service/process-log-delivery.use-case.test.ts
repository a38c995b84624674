import test from 'node:test';
import assert from 'node:assert/strict';
import { ProcessLogDeliveryUseCase } from '../../../services/worker-service/src/application/processing/process-log-delivery.use-case';
import type { ProcessingDelayStrategy } from '../../../services/worker-service/src/application/processing/ports/processing-delay.port';
import type { TenantStore } from '../../../services/worker-service/src/application/processing/ports/tenant-store.port';
import {
  MalformedDeliveryError,
  TransientProcessingError,
} from '../../../services/worker-service/src/domain/processing/processing.errors';
import { InMemoryTenantStoreAdapter } from '../../../services/worker-service/src/infrastructure/persistence/in-memory-tenant-store.adapter';
import { LengthProportionalDelayStrategy } from '../../../services/worker-service/src/infrastructure/processing/length-proportional-delay.strategy';
import {
  encodeLogRecordAcceptedEvent,
  type CanonicalLogRecord,
} from '../../../packages/shared/src/messaging/contracts';
import { createEnvelope } from '../../../packages/shared/src/messaging/envelope';

const RECEIVED_AT = '2026-03-02T09:15:00.000Z';

function encodeRecord(overrides: Partial<CanonicalLogRecord> = {}): Buffer {
  const payload: CanonicalLogRecord = {
    tenantId: 'acme',
    logId: 'log-1',
    text: 'Call 555-0199 now',
    source: 'structured_upload',
    receivedAt: RECEIVED_AT,
    ...overrides,
  };

  return encodeLogRecordAcceptedEvent(createEnvelope({
    messageId: 'msg-1',
    type: 'LogRecordAccepted.v1',
    producer: 'intake-service',
    correlationId: 'corr-1',
    payload,
  }));
}

function createUseCase(overrides: { tenantStore?: TenantStore; delay?: ProcessingDelayStrategy } = {}) {
  const tenantStore = overrides.tenantStore ?? new InMemoryTenantStoreAdapter();
  const sleeps: number[] = [];
  const delay = overrides.delay ?? new LengthProportionalDelayStrategy(50, async (delayMs) => {
    sleeps.push(delayMs);
  });

  return { useCase: new ProcessLogDeliveryUseCase(tenantStore, delay), tenantStore, sleeps };
}

test('a valid delivery is delayed, redacted, stored and acknowledged', async () => {
  const { useCase, tenantStore, sleeps } = createUseCase();

  const outcome = await useCase.execute({ body: encodeRecord(), transport: 'rabbitmq', deliveryAttempt: 1 });

  assert.deepEqual(outcome, {
    action: 'ack',
    tenantId: 'acme',
    logId: 'log-1',
    documentPath: 'tenants/acme/processed_logs/log-1',
    processingTimeSeconds: 0.85,
  });
  assert.deepEqual(sleeps, [850]);

  const document = await tenantStore.get('acme', 'log-1');
  assert.ok(document);
  const { processed_at: processedAt, ...rest } = document;
  assert.deepEqual(rest, {
    source: 'structured_upload',
    original_text: 'Call 555-0199 now',
    modified_data: 'Call [REDACTED] now',
    received_at: RECEIVED_AT,
    processing_time: 0.85,
    char_count: 17,
  });
  assert.ok(Number.isFinite(Date.parse(processedAt)));
});

test('characters outside the BMP count once in char_count and the delay', async () => {
  const { useCase, tenantStore, sleeps } = createUseCase();

  const outcome = await useCase.execute({ body: encodeRecord({ text: '\u{1F4DE} 555-0199' }), transport: 'push' });

  assert.equal(outcome.action === 'ack' ? outcome.processingTimeSeconds : undefined, 0.5);
  assert.deepEqual(sleeps, [500]);
  const document = await tenantStore.get('acme', 'log-1');
  assert.equal(document?.char_count, 10);
  assert.equal(document?.processing_time, 0.5);
  assert.equal(document?.modified_data, '\u{1F4DE} [REDACTED]');
});

test('redelivering the same record converges on one document that is fully replaced', async () => {
  const { useCase, tenantStore } = createUseCase();

  await useCase.execute({ body: encodeRecord({ text: 'first 555-1234' }), transport: 'rabbitmq' });
  await useCase.execute({ body: encodeRecord({ text: 'second' }), transport: 'rabbitmq' });
  await useCase.execute({ body: encodeRecord({ text: 'second' }), transport: 'push' });

  const stored = await tenantStore.list('acme');
  assert.equal(stored.length, 1);
  assert.equal(stored[0]?.document.original_text, 'second');
  assert.equal(stored[0]?.document.modified_data, 'second');
  assert.equal(stored[0]?.document.char_count, 6);
});

test('the same log id under two tenants produces two separate documents', async () => {
  const { useCase, tenantStore } = createUseCase();

  await useCase.execute({ body: encodeRecord({ tenantId: 'acme', text: 'for acme' }), transport: 'push' });
  await useCase.execute({ body: encodeRecord({ tenantId: 'globex', text: 'for globex' }), transport: 'push' });

  assert.equal((await tenantStore.get('acme', 'log-1'))?.original_text, 'for acme');
  assert.equal((await tenantStore.get('globex', 'log-1'))?.original_text, 'for globex');
  assert.equal((await tenantStore.list('acme')).length, 1);
});

test('undecodable deliveries are discarded without touching the store', async () => {
  const { useCase, tenantStore, sleeps } = createUseCase();

  const invalidJson = await useCase.execute({ body: Buffer.from('{oops', 'utf-8'), transport: 'rabbitmq' });
  const wrongShape = await useCase.execute({ body: '{"kind":"event"}', transport: 'push' });

  assert.equal(invalidJson.action, 'discard');
  assert.equal(invalidJson.action === 'discard' ? invalidJson.reason : '', 'Undecodable delivery (invalid-json).');
  assert.ok(invalidJson.action === 'discard' && invalidJson.error instanceof MalformedDeliveryError);
  assert.equal(wrongShape.action === 'discard' ? wrongShape.reason : '', 'Undecodable delivery (unsupported-message).');
  assert.deepEqual(sleeps, []);
  assert.deepEqual(await tenantStore.list('acme'), []);
});

test('a record whose ids cannot form a storage key is discarded', async () => {
  const { useCase } = createUseCase();

  const outcome = await useCase.execute({ body: encodeRecord({ tenantId: 'acme/../globex' }), transport: 'rabbitmq' });

  assert.equal(outcome.action, 'discard');
  assert.equal(
    outcome.action === 'discard' ? outcome.reason : '',
    `Invalid tenant_id "acme/../globex": use letters, digits, '-' and '_' (1-64 characters)`,
  );
});

test('a failing store write asks for a retry and keeps the cause', async () => {
  const storeError = new Error('store unavailable');
  const tenantStore: TenantStore = {
    async put() {
      throw storeError;
    },
    async get() {
      return undefined;
    },
    async list() {
      return [];
    },
  };
  const { useCase } = createUseCase({ tenantStore });

  const outcome = await useCase.execute({ body: encodeRecord(), transport: 'rabbitmq', deliveryAttempt: 4 });

  assert.equal(outcome.action, 'retry');
  if (outcome.action !== 'retry') {
    return;
  }
  assert.equal(outcome.reason, 'Processing failed for tenant acme log log-1; delivery will be retried.');
  assert.equal(outcome.tenantId, 'acme');
  assert.equal(outcome.logId, 'log-1');
  assert.ok(outcome.error instanceof TransientProcessingError);
  assert.equal(outcome.error.cause, storeError);
});

test('a failing delay asks for a retry before anything is stored', async () => {
  const { useCase, tenantStore } = createUseCase({
    delay: {
      async simulate() {
        throw new Error('timer cancelled');
      },
    },
  });

  const outcome = await useCase.execute({ body: encodeRecord(), transport: 'push' });

  assert.equal(outcome.action, 'retry');
  assert.equal(await tenantStore.get('acme', 'log-1'), undefined);
});
