import test from 'node:test';
import assert from 'node:assert/strict';
import {
  assertLogIngestTopology,
  resolveLogIngestTopology,
  type RabbitMqTopologyChannelLike,
} from '../../../packages/shared/src/messaging/rabbitmq-topology';

test('resolveLogIngestTopology derives retry and parking names from the queue', () => {
  assert.deepEqual(
    resolveLogIngestTopology({ exchange: 'logs.ingest', queue: 'q.log-worker', retryDelayMs: 60_000 }),
    {
      exchange: 'logs.ingest',
      queue: 'q.log-worker',
      bindingPattern: 'logs.record.accepted.*',
      retryExchange: 'retry.q.log-worker',
      retryQueue: 'q.log-worker.retry',
      parkingExchange: 'dlq.q.log-worker',
      parkingQueue: 'q.log-worker.dlq',
      retryDelayMs: 60_000,
    },
  );
});

test('resolveLogIngestTopology rejects a non-positive retry delay', () => {
  assert.throws(
    () => resolveLogIngestTopology({ exchange: 'logs.ingest', queue: 'q.log-worker', retryDelayMs: 0 }),
    /Invalid retry delay: 0/,
  );
});

test('assertLogIngestTopology routes rejected messages through the retry queue back to the main exchange', async () => {
  const calls: string[] = [];
  const queueArguments = new Map<string, Record<string, unknown> | undefined>();

  const channel: RabbitMqTopologyChannelLike = {
    async assertExchange(exchange, type) {
      calls.push(`exchange ${exchange} ${type}`);
    },
    async assertQueue(queue, options) {
      calls.push(`queue ${queue}`);
      queueArguments.set(queue, options?.arguments);
    },
    async bindQueue(queue, source, pattern) {
      calls.push(`bind ${queue} ${source} ${pattern}`);
    },
  };

  await assertLogIngestTopology(
    channel,
    resolveLogIngestTopology({ exchange: 'logs.ingest', queue: 'q.log-worker', retryDelayMs: 5_000 }),
  );

  assert.deepEqual(calls, [
    'exchange logs.ingest topic',
    'exchange retry.q.log-worker topic',
    'exchange dlq.q.log-worker topic',
    'queue q.log-worker',
    'bind q.log-worker logs.ingest logs.record.accepted.*',
    'queue q.log-worker.retry',
    'bind q.log-worker.retry retry.q.log-worker #',
    'queue q.log-worker.dlq',
    'bind q.log-worker.dlq dlq.q.log-worker #',
  ]);
  assert.deepEqual(queueArguments.get('q.log-worker'), { 'x-dead-letter-exchange': 'retry.q.log-worker' });
  assert.deepEqual(queueArguments.get('q.log-worker.retry'), {
    'x-message-ttl': 5_000,
    'x-dead-letter-exchange': 'logs.ingest',
  });
  assert.equal(queueArguments.get('q.log-worker.dlq'), undefined);
});
