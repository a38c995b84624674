import { formatJsonLogLine, type LogLevel } from '../logging/json-log.js';
import { isRecord } from './envelope.js';
import { buildParkingExchangeName } from './rabbitmq-topology.js';

export interface RabbitMqConsumerMessageLike {
  content: Buffer;
  fields: {
    routingKey?: unknown;
  };
  properties: {
    messageId?: unknown;
    correlationId?: unknown;
    type?: unknown;
    timestamp?: unknown;
    headers?: unknown;
  };
}

export interface RabbitMqConsumerChannelLike {
  ack(message: RabbitMqConsumerMessageLike, allUpTo?: boolean): unknown;
  nack(message: RabbitMqConsumerMessageLike, allUpTo?: boolean, requeue?: boolean): unknown;
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options?: unknown,
  ): boolean;
}

export type DeliveryAction = 'ack' | 'retry' | 'discard';

export interface DeliveryActionDecision {
  action: 'acked' | 'retry-scheduled' | 'parked';
  queue: string;
  deliveryAttempt: number;
  parkingExchange?: string;
  parkingReason?: string;
}

export interface ApplyDeliveryActionInput {
  channel: RabbitMqConsumerChannelLike;
  message: RabbitMqConsumerMessageLike;
  queue: string;
  action: DeliveryAction;
  /** Messages first published longer ago than this are parked instead of retried. */
  retentionWindowMs?: number;
  parkingReason?: string;
  now?: number;
}

const DEFAULT_PARKING_ROUTING_KEY = 'parking';

/**
 * Settles one delivery. `retry` rejects without requeue so the queue's dead-letter
 * exchange holds the message for the retry delay; there is no attempt cap, only the
 * retention window.
 */
export function applyRabbitMqDeliveryAction(input: ApplyDeliveryActionInput): DeliveryActionDecision {
  const deliveryAttempt = getRabbitMqDeliveryAttempt(input.message, input.queue);

  if (input.action === 'ack') {
    input.channel.ack(input.message);
    return { action: 'acked', queue: input.queue, deliveryAttempt };
  }

  if (input.action === 'discard') {
    return park(input, deliveryAttempt, input.parkingReason ?? 'discarded');
  }

  if (isBeyondRetentionWindow(input.message, input.retentionWindowMs, input.now ?? Date.now())) {
    return park(input, deliveryAttempt, 'retention-window-elapsed');
  }

  input.channel.nack(input.message, false, false);
  return { action: 'retry-scheduled', queue: input.queue, deliveryAttempt };
}

function park(
  input: ApplyDeliveryActionInput,
  deliveryAttempt: number,
  reason: string,
): DeliveryActionDecision {
  const parkingExchange = buildParkingExchangeName(input.queue);

  const headers = copyHeaders(input.message.properties.headers);
  headers['x-parked-at'] = new Date(input.now ?? Date.now()).toISOString();
  headers['x-parked-from-queue'] = input.queue;
  headers['x-parked-delivery-attempt'] = deliveryAttempt;
  headers['x-parked-reason'] = reason;

  input.channel.publish(parkingExchange, DEFAULT_PARKING_ROUTING_KEY, input.message.content, {
    ...input.message.properties,
    headers,
  });
  input.channel.ack(input.message);

  return {
    action: 'parked',
    queue: input.queue,
    deliveryAttempt,
    parkingExchange,
    parkingReason: reason,
  };
}

export function isBeyondRetentionWindow(
  message: RabbitMqConsumerMessageLike,
  retentionWindowMs: number | undefined,
  now: number,
): boolean {
  if (retentionWindowMs === undefined) {
    return false;
  }

  const publishedAt = message.properties.timestamp;
  if (typeof publishedAt !== 'number' || !Number.isFinite(publishedAt)) {
    return false;
  }

  return now - publishedAt > retentionWindowMs;
}

export function getRabbitMqDeliveryAttempt(
  message: RabbitMqConsumerMessageLike,
  queue: string,
): number {
  return getRabbitMqQueueDeadLetterCount(message, queue) + 1;
}

export function getRabbitMqQueueDeadLetterCount(
  message: RabbitMqConsumerMessageLike,
  queue: string,
): number {
  const headers = isRecord(message.properties.headers) ? message.properties.headers : undefined;
  const raw = headers?.['x-death'];
  if (!Array.isArray(raw)) {
    return 0;
  }

  let total = 0;

  for (const item of raw) {
    if (!isRecord(item) || item.queue !== queue) {
      continue;
    }

    total += toSafePositiveInt(item.count);
  }

  return total;
}

export function createRabbitMqConsumerJsonLogLine(input: {
  level: LogLevel;
  service: string;
  message: string;
  queue: string;
  amqpMessage?: RabbitMqConsumerMessageLike;
  envelope?: unknown;
  error?: unknown;
  metadata?: Record<string, unknown>;
}): string {
  const envelopeFields = extractEnvelopeFields(input.envelope);
  const properties = input.amqpMessage?.properties;
  const routingKey = input.amqpMessage?.fields.routingKey;

  return formatJsonLogLine({
    level: input.level,
    service: input.service,
    message: input.message,
    correlationId: envelopeFields.correlationId ?? stringOrUndefined(properties?.correlationId) ?? 'unknown',
    messageId: envelopeFields.messageId ?? stringOrUndefined(properties?.messageId),
    causationId: envelopeFields.causationId,
    messageType: envelopeFields.messageType ?? stringOrUndefined(properties?.type),
    routingKey: stringOrUndefined(routingKey),
    queue: input.queue,
    tenantId: envelopeFields.tenantId,
    logId: envelopeFields.logId,
    metadata: input.metadata,
    error: input.error,
  });
}

function extractEnvelopeFields(envelope: unknown): {
  correlationId?: string;
  causationId?: string;
  messageId?: string;
  messageType?: string;
  tenantId?: string;
  logId?: string;
} {
  if (!isRecord(envelope)) {
    return {};
  }

  const payload = isRecord(envelope.payload) ? envelope.payload : undefined;

  return {
    correlationId: stringOrUndefined(envelope.correlationId),
    causationId: stringOrUndefined(envelope.causationId),
    messageId: stringOrUndefined(envelope.messageId),
    messageType: stringOrUndefined(envelope.type),
    tenantId: stringOrUndefined(payload?.tenantId),
    logId: stringOrUndefined(payload?.logId),
  };
}

function stringOrUndefined(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function copyHeaders(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    return {};
  }
  return { ...value };
}

function toSafePositiveInt(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    return Math.trunc(value);
  }

  if (typeof value === 'bigint' && value > 0n) {
    return Number(value);
  }

  const parsed = Number.parseInt(String(value ?? ''), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return 0;
  }

  return Math.trunc(parsed);
}
