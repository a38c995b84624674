import { DEFAULT_QUEUE_BINDINGS, SERVICE_QUEUES } from '../standards.js';

export interface LogIngestTopology {
  exchange: string;
  queue: string;
  bindingPattern: string;
  retryExchange: string;
  retryQueue: string;
  parkingExchange: string;
  parkingQueue: string;
  retryDelayMs: number;
}

export interface ResolveLogIngestTopologyInput {
  exchange: string;
  queue: string;
  /** How long a rejected delivery waits before it is routed back to the main queue. */
  retryDelayMs: number;
}

export interface RabbitMqTopologyChannelLike {
  assertExchange(exchange: string, type: string, options?: { durable?: boolean }): Promise<unknown>;
  assertQueue(
    queue: string,
    options?: { durable?: boolean; arguments?: Record<string, unknown> },
  ): Promise<unknown>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
}

export function resolveLogIngestTopology(input: ResolveLogIngestTopologyInput): LogIngestTopology {
  if (!Number.isInteger(input.retryDelayMs) || input.retryDelayMs <= 0) {
    throw new Error(`Invalid retry delay: ${input.retryDelayMs}`);
  }

  return {
    exchange: input.exchange,
    queue: input.queue,
    bindingPattern: DEFAULT_QUEUE_BINDINGS[SERVICE_QUEUES.logWorker][0],
    retryExchange: buildRetryExchangeName(input.queue),
    retryQueue: `${input.queue}.retry`,
    parkingExchange: buildParkingExchangeName(input.queue),
    parkingQueue: `${input.queue}.dlq`,
    retryDelayMs: input.retryDelayMs,
  };
}

/**
 * Declares the delivery channel. Publisher and consumer both call this with the same
 * values; RabbitMQ rejects a redeclaration whose queue arguments differ.
 */
export async function assertLogIngestTopology(
  channel: RabbitMqTopologyChannelLike,
  topology: LogIngestTopology,
): Promise<void> {
  await channel.assertExchange(topology.exchange, 'topic', { durable: true });
  await channel.assertExchange(topology.retryExchange, 'topic', { durable: true });
  await channel.assertExchange(topology.parkingExchange, 'topic', { durable: true });

  await channel.assertQueue(topology.queue, {
    durable: true,
    arguments: {
      'x-dead-letter-exchange': topology.retryExchange,
    },
  });
  await channel.bindQueue(topology.queue, topology.exchange, topology.bindingPattern);

  await channel.assertQueue(topology.retryQueue, {
    durable: true,
    arguments: {
      'x-message-ttl': topology.retryDelayMs,
      'x-dead-letter-exchange': topology.exchange,
    },
  });
  await channel.bindQueue(topology.retryQueue, topology.retryExchange, '#');

  await channel.assertQueue(topology.parkingQueue, { durable: true });
  await channel.bindQueue(topology.parkingQueue, topology.parkingExchange, '#');
}

export function buildRetryExchangeName(queue: string): string {
  return `retry.${queue}`;
}

export function buildParkingExchangeName(queue: string): string {
  return `dlq.${queue}`;
}
