export type MessageKind = 'event';

export interface EventEnvelope<TPayload = unknown, TType extends string = string> {
  messageId: string;
  kind: MessageKind;
  type: TType;
  occurredAt: string;
  correlationId: string;
  causationId?: string;
  producer: string;
  version: number;
  payload: TPayload;
}

export interface CreateEnvelopeInput<TPayload, TType extends string> {
  messageId: string;
  type: TType;
  producer: string;
  payload: TPayload;
  correlationId: string;
  causationId?: string;
  occurredAt?: string;
  version?: number;
}

export function createEnvelope<TPayload, TType extends string>(
  input: CreateEnvelopeInput<TPayload, TType>,
): EventEnvelope<TPayload, TType> {
  return {
    messageId: input.messageId,
    kind: 'event',
    type: input.type,
    producer: input.producer,
    payload: input.payload,
    correlationId: input.correlationId,
    causationId: input.causationId,
    occurredAt: input.occurredAt ?? new Date().toISOString(),
    version: input.version ?? 1,
  };
}

/**
 * Structural check of the envelope fields only; payload shape is validated by the
 * contract that owns the message type.
 */
export function isEventEnvelope(value: unknown): value is EventEnvelope<unknown> {
  if (!isRecord(value)) {
    return false;
  }

  return (
    value.kind === 'event' &&
    typeof value.messageId === 'string' &&
    value.messageId.length > 0 &&
    typeof value.type === 'string' &&
    typeof value.occurredAt === 'string' &&
    typeof value.correlationId === 'string' &&
    (value.causationId === undefined || typeof value.causationId === 'string') &&
    typeof value.producer === 'string' &&
    typeof value.version === 'number' &&
    'payload' in value
  );
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
