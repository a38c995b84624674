import { MESSAGE_EXCHANGES } from '../standards.js';
import { isEventEnvelope, isRecord, type EventEnvelope } from './envelope.js';

export const LOG_RECORD_SOURCES = ['structured_upload', 'text_upload'] as const;

export type LogRecordSource = (typeof LOG_RECORD_SOURCES)[number];

/**
 * Format-agnostic, in-flight representation of one accepted log submission.
 * `tenantId` and `logId` are fixed at intake and form the storage key downstream.
 */
export interface CanonicalLogRecord {
  tenantId: string;
  logId: string;
  text: string;
  source: LogRecordSource;
  receivedAt: string;
}

export type EventTypeV1 = 'LogRecordAccepted.v1';

export type EventRoutingKeyV1 = 'logs.record.accepted.v1';

export interface EventPayloadMapV1 {
  'LogRecordAccepted.v1': CanonicalLogRecord;
}

export const EVENT_ROUTING_KEYS_V1: { [K in EventTypeV1]: EventRoutingKeyV1 } = {
  'LogRecordAccepted.v1': 'logs.record.accepted.v1',
};

export interface MessageCatalogEntryV1 {
  kind: 'event';
  type: EventTypeV1;
  exchange: typeof MESSAGE_EXCHANGES.logs;
  routingKey: EventRoutingKeyV1;
  producer: string;
  consumers: string[];
  status: 'implemented' | 'planned';
}

export const MESSAGE_CATALOG_V1: Record<EventTypeV1, MessageCatalogEntryV1> = {
  'LogRecordAccepted.v1': {
    kind: 'event',
    type: 'LogRecordAccepted.v1',
    exchange: MESSAGE_EXCHANGES.logs,
    routingKey: EVENT_ROUTING_KEYS_V1['LogRecordAccepted.v1'],
    producer: 'intake-service',
    consumers: ['worker-service'],
    status: 'implemented',
  },
};

export type DomainEventV1<TType extends EventTypeV1 = EventTypeV1> = EventEnvelope<
  EventPayloadMapV1[TType],
  TType
>;

export type LogRecordAcceptedEvent = DomainEventV1<'LogRecordAccepted.v1'>;

export type DecodeLogRecordResult =
  | { ok: true; event: LogRecordAcceptedEvent }
  | { ok: false; reason: 'invalid-json' | 'unsupported-message'; error?: unknown };

export function isLogRecordSource(value: unknown): value is LogRecordSource {
  return typeof value === 'string' && LOG_RECORD_SOURCES.some((source) => source === value);
}

export function isCanonicalLogRecord(value: unknown): value is CanonicalLogRecord {
  if (!isRecord(value)) {
    return false;
  }

  return (
    typeof value.tenantId === 'string' &&
    value.tenantId.length > 0 &&
    typeof value.logId === 'string' &&
    value.logId.length > 0 &&
    typeof value.text === 'string' &&
    isLogRecordSource(value.source) &&
    typeof value.receivedAt === 'string'
  );
}

export function isLogRecordAcceptedEvent(value: unknown): value is LogRecordAcceptedEvent {
  return (
    isEventEnvelope(value) &&
    value.type === 'LogRecordAccepted.v1' &&
    isCanonicalLogRecord(value.payload)
  );
}

export function encodeLogRecordAcceptedEvent(event: LogRecordAcceptedEvent): Buffer {
  return Buffer.from(JSON.stringify(event), 'utf-8');
}

export function decodeLogRecordAcceptedEvent(content: Buffer | string): DecodeLogRecordResult {
  let parsed: unknown;

  try {
    parsed = JSON.parse(typeof content === 'string' ? content : content.toString('utf-8'));
  } catch (error) {
    return { ok: false, reason: 'invalid-json', error };
  }

  if (!isLogRecordAcceptedEvent(parsed)) {
    return { ok: false, reason: 'unsupported-message' };
  }

  return { ok: true, event: parsed };
}
