import type { LogRecordAcceptedEvent } from '@log-ingest/shared';

export const LOG_RECORD_PUBLISHER = Symbol('LOG_RECORD_PUBLISHER');

export interface PublishReceipt {
  /** Transport-assigned id of the enqueued message. */
  messageId: string;
}

export interface LogRecordPublisher {
  /** Resolves only once the broker has confirmed the message is durable. */
  publish(event: LogRecordAcceptedEvent): Promise<PublishReceipt>;
}
