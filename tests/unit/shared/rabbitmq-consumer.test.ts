import test from 'node:test';
import assert from 'node:assert/strict';
import {
  applyRabbitMqDeliveryAction,
  createRabbitMqConsumerJsonLogLine,
  getRabbitMqDeliveryAttempt,
  isBeyondRetentionWindow,
  type RabbitMqConsumerChannelLike,
  type RabbitMqConsumerMessageLike,
} from '../../../packages/shared/src/messaging/rabbitmq-consumer';
import { isRecord } from '../../../packages/shared/src/messaging/envelope';

const QUEUE = 'q.log-worker';
const RETENTION_MS = 60_000;

interface PublishedMessage {
  exchange: string;
  routingKey: string;
  content: Buffer;
  options: unknown;
}

function createChannel() {
  const acked: RabbitMqConsumerMessageLike[] = [];
  const nacked: Array<{ message: RabbitMqConsumerMessageLike; allUpTo?: boolean; requeue?: boolean }> = [];
  const published: PublishedMessage[] = [];

  const channel: RabbitMqConsumerChannelLike = {
    ack(message) {
      acked.push(message);
    },
    nack(message, allUpTo, requeue) {
      nacked.push({ message, allUpTo, requeue });
    },
    publish(exchange, routingKey, content, options) {
      published.push({ exchange, routingKey, content, options });
      return true;
    },
  };

  return { channel, acked, nacked, published };
}

function createMessage(properties: RabbitMqConsumerMessageLike['properties'] = {}): RabbitMqConsumerMessageLike {
  return {
    content: Buffer.from('{"hello":"world"}', 'utf-8'),
    fields: { routingKey: 'logs.record.accepted.v1' },
    properties,
  };
}

function readHeaders(options: unknown): Record<string, unknown> {
  return isRecord(options) && isRecord(options.headers) ? options.headers : {};
}

test('ack settles the delivery with a single ack', () => {
  const { channel, acked, nacked, published } = createChannel();
  const message = createMessage();

  const decision = applyRabbitMqDeliveryAction({ channel, message, queue: QUEUE, action: 'ack' });

  assert.deepEqual(decision, { action: 'acked', queue: QUEUE, deliveryAttempt: 1 });
  assert.equal(acked.length, 1);
  assert.equal(nacked.length, 0);
  assert.equal(published.length, 0);
});

test('retry inside the retention window rejects without requeue and counts x-death for this queue only', () => {
  const { channel, acked, nacked } = createChannel();
  const message = createMessage({
    timestamp: 1_000,
    headers: {
      'x-death': [
        { queue: QUEUE, count: 2 },
        { queue: 'q.other', count: 5 },
      ],
    },
  });

  const decision = applyRabbitMqDeliveryAction({
    channel,
    message,
    queue: QUEUE,
    action: 'retry',
    retentionWindowMs: RETENTION_MS,
    now: 1_000 + RETENTION_MS,
  });

  assert.deepEqual(decision, { action: 'retry-scheduled', queue: QUEUE, deliveryAttempt: 3 });
  assert.equal(acked.length, 0);
  assert.deepEqual(nacked, [{ message, allUpTo: false, requeue: false }]);
});

test('retry after the retention window parks the delivery instead', () => {
  const { channel, acked, nacked, published } = createChannel();
  const message = createMessage({ timestamp: 1_000, messageId: 'msg-1' });
  const now = 1_000 + RETENTION_MS + 1;

  const decision = applyRabbitMqDeliveryAction({
    channel,
    message,
    queue: QUEUE,
    action: 'retry',
    retentionWindowMs: RETENTION_MS,
    now,
  });

  assert.deepEqual(decision, {
    action: 'parked',
    queue: QUEUE,
    deliveryAttempt: 1,
    parkingExchange: 'dlq.q.log-worker',
    parkingReason: 'retention-window-elapsed',
  });
  assert.equal(nacked.length, 0);
  assert.equal(acked.length, 1);
  assert.equal(published.length, 1);
  assert.equal(published[0]?.exchange, 'dlq.q.log-worker');
  assert.equal(published[0]?.routingKey, 'parking');
  assert.deepEqual(published[0]?.content, message.content);
  assert.deepEqual(readHeaders(published[0]?.options), {
    'x-parked-at': new Date(now).toISOString(),
    'x-parked-from-queue': QUEUE,
    'x-parked-delivery-attempt': 1,
    'x-parked-reason': 'retention-window-elapsed',
  });
});

test('discard parks with the given reason and keeps existing headers', () => {
  const { channel, acked, published } = createChannel();
  const message = createMessage({ headers: { tenantId: 'acme' } });

  const decision = applyRabbitMqDeliveryAction({
    channel,
    message,
    queue: QUEUE,
    action: 'discard',
    parkingReason: 'malformed-delivery',
    now: 0,
  });

  assert.equal(decision.action, 'parked');
  assert.equal(decision.parkingReason, 'malformed-delivery');
  assert.equal(acked.length, 1);
  assert.equal(readHeaders(published[0]?.options).tenantId, 'acme');
  assert.equal(readHeaders(published[0]?.options)['x-parked-reason'], 'malformed-delivery');
});

test('isBeyondRetentionWindow ignores deliveries without a numeric timestamp', () => {
  assert.equal(isBeyondRetentionWindow(createMessage(), RETENTION_MS, Number.MAX_SAFE_INTEGER), false);
  assert.equal(isBeyondRetentionWindow(createMessage({ timestamp: 'yesterday' }), RETENTION_MS, 10 ** 12), false);
  assert.equal(isBeyondRetentionWindow(createMessage({ timestamp: 0 }), undefined, 10 ** 12), false);
});

test('getRabbitMqDeliveryAttempt tolerates string and missing counts', () => {
  const message = createMessage({
    headers: { 'x-death': [{ queue: QUEUE, count: '4' }, { queue: QUEUE }, 'garbage'] },
  });
  assert.equal(getRabbitMqDeliveryAttempt(message, QUEUE), 5);
});

test('createRabbitMqConsumerJsonLogLine lifts trace fields from the envelope and its payload', () => {
  const line = createRabbitMqConsumerJsonLogLine({
    level: 'warn',
    service: 'worker-service',
    message: 'parked',
    queue: QUEUE,
    amqpMessage: createMessage({ messageId: 'amqp-msg' }),
    envelope: {
      messageId: 'env-msg',
      correlationId: 'corr-1',
      type: 'LogRecordAccepted.v1',
      payload: { tenantId: 'acme', logId: 'log-1' },
    },
  });

  const entry: unknown = JSON.parse(line);
  assert.ok(isRecord(entry));
  assert.deepEqual(
    {
      level: entry.level,
      correlationId: entry.correlationId,
      messageId: entry.messageId,
      routingKey: entry.routingKey,
      tenantId: entry.tenantId,
      logId: entry.logId,
    },
    {
      level: 'warn',
      correlationId: 'corr-1',
      messageId: 'env-msg',
      routingKey: 'logs.record.accepted.v1',
      tenantId: 'acme',
      logId: 'log-1',
    },
  );
});
