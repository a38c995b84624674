import { HttpStatus } from '@nestjs/common';
import { isRecord } from '@log-ingest/shared';
import type { DeliveryOutcome } from '../../../domain/processing/delivery-outcome';

/** Body a push subscription POSTs for each message. */
export interface PushEnvelope {
  message: {
    data: string;
    messageId?: string;
    attributes?: Record<string, string>;
    publishTime?: string;
  };
  subscription?: string;
}

export type DecodePushEnvelopeResult =
  | { ok: true; data: Buffer; messageId?: string; subscription?: string }
  | { ok: false; reason: string };

export type PushResponseBody =
  | { status: 'processed'; log_id: string }
  | { detail: string };

export interface PushResponse {
  statusCode: number;
  body: PushResponseBody;
}

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodePushEnvelope(body: unknown): DecodePushEnvelopeResult {
  if (!isRecord(body) || !isRecord(body.message)) {
    return { ok: false, reason: 'Push envelope is missing "message".' };
  }

  const data = body.message.data;
  if (typeof data !== 'string' || data.trim().length === 0) {
    return { ok: false, reason: 'Push message is missing "data".' };
  }

  const encoded = data.trim();
  if (encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
    return { ok: false, reason: 'Push message "data" is not valid base64.' };
  }

  return {
    ok: true,
    data: Buffer.from(encoded, 'base64'),
    messageId: typeof body.message.messageId === 'string' ? body.message.messageId : undefined,
    subscription: typeof body.subscription === 'string' ? body.subscription : undefined,
  };
}

/**
 * 2xx acknowledges the push; any other status makes the sender redeliver. A 400 for a
 * discard relies on the subscription's dead-letter policy to stop redelivery.
 */
export function mapOutcomeToPushResponse(outcome: DeliveryOutcome): PushResponse {
  switch (outcome.action) {
    case 'ack':
      return { statusCode: HttpStatus.OK, body: { status: 'processed', log_id: outcome.logId } };
    case 'discard':
      return { statusCode: HttpStatus.BAD_REQUEST, body: { detail: outcome.reason } };
    case 'retry':
      return { statusCode: HttpStatus.INTERNAL_SERVER_ERROR, body: { detail: outcome.reason } };
  }
}
