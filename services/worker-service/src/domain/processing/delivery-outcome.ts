import type { MalformedDeliveryError, TransientProcessingError } from './processing.errors';

export interface AckOutcome {
  action: 'ack';
  tenantId: string;
  logId: string;
  documentPath: string;
  processingTimeSeconds: number;
}

export interface RetryOutcome {
  action: 'retry';
  reason: string;
  error: TransientProcessingError;
  tenantId: string;
  logId: string;
}

export interface DiscardOutcome {
  action: 'discard';
  reason: string;
  error: MalformedDeliveryError;
}

/** What the transport should do with one delivery. */
export type DeliveryOutcome = AckOutcome | RetryOutcome | DiscardOutcome;
