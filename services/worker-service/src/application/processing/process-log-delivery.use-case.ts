import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  decodeLogRecordAcceptedEvent,
  formatJsonLogLine,
  type LogRecordAcceptedEvent,
} from '@log-ingest/shared';
import type { DeliveryOutcome, DiscardOutcome } from '../../domain/processing/delivery-outcome';
import { buildProcessedLogDocument } from '../../domain/processing/processed-log-document';
import { MalformedDeliveryError, TransientProcessingError } from '../../domain/processing/processing.errors';
import { redactPhoneNumbers } from '../../domain/redaction/redact-phone-numbers';
import { buildProcessedLogPath, TenantKeyError } from '../../domain/tenancy/tenant-document-path';
import { PROCESSING_DELAY_STRATEGY, type ProcessingDelayStrategy } from './ports/processing-delay.port';
import { TENANT_STORE, type TenantStore } from './ports/tenant-store.port';

const SERVICE_NAME = 'worker-service';

export type DeliveryTransport = 'rabbitmq' | 'push';

export interface LogDelivery {
  body: Buffer | string;
  transport: DeliveryTransport;
  transportMessageId?: string;
  deliveryAttempt?: number;
}

/**
 * Receive, process, persist. Undecodable deliveries are discarded; anything that fails after
 * decoding is retried, and the store write is a full replace so a retry converges.
 */
@Injectable()
export class ProcessLogDeliveryUseCase {
  private readonly logger = new Logger(ProcessLogDeliveryUseCase.name);

  constructor(
    @Inject(TENANT_STORE)
    private readonly tenantStore: TenantStore,
    @Inject(PROCESSING_DELAY_STRATEGY)
    private readonly delay: ProcessingDelayStrategy,
  ) {}

  async execute(delivery: LogDelivery): Promise<DeliveryOutcome> {
    const decoded = decodeLogRecordAcceptedEvent(delivery.body);
    if (!decoded.ok) {
      return this.discard(
        delivery,
        new MalformedDeliveryError(`Undecodable delivery (${decoded.reason}).`, { cause: decoded.error }),
      );
    }

    const event = decoded.event;
    const { tenantId, logId } = event.payload;

    let documentPath: string;
    try {
      documentPath = buildProcessedLogPath(tenantId, logId);
    } catch (error) {
      if (!(error instanceof TenantKeyError)) {
        throw error;
      }
      return this.discard(delivery, new MalformedDeliveryError(error.message, { cause: error }), event);
    }

    try {
      const processingTimeSeconds = await this.delay.simulate(event.payload.text);
      const document = buildProcessedLogDocument({
        record: event.payload,
        modifiedText: redactPhoneNumbers(event.payload.text),
        processingTimeSeconds,
        processedAt: new Date(),
      });

      await this.tenantStore.put(tenantId, logId, document);

      this.logger.log(formatJsonLogLine({
        level: 'info',
        service: SERVICE_NAME,
        message: 'Log record processed and stored.',
        correlationId: event.correlationId,
        messageId: event.messageId,
        messageType: event.type,
        tenantId,
        logId,
        metadata: {
          transport: delivery.transport,
          deliveryAttempt: delivery.deliveryAttempt,
          documentPath,
          charCount: document.char_count,
          processingTimeSeconds,
        },
      }));

      return { action: 'ack', tenantId, logId, documentPath, processingTimeSeconds };
    } catch (cause) {
      const error = new TransientProcessingError(
        `Processing failed for tenant ${tenantId} log ${logId}; delivery will be retried.`,
        { cause },
      );

      this.logger.error(formatJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: error.message,
        correlationId: event.correlationId,
        messageId: event.messageId,
        messageType: event.type,
        tenantId,
        logId,
        metadata: {
          transport: delivery.transport,
          transportMessageId: delivery.transportMessageId,
          deliveryAttempt: delivery.deliveryAttempt,
        },
        error,
      }));

      return { action: 'retry', reason: error.message, error, tenantId, logId };
    }
  }

  private discard(
    delivery: LogDelivery,
    error: MalformedDeliveryError,
    event?: LogRecordAcceptedEvent,
  ): DiscardOutcome {
    this.logger.warn(formatJsonLogLine({
      level: 'warn',
      service: SERVICE_NAME,
      message: `Discarding malformed delivery: ${error.message}`,
      correlationId: event?.correlationId,
      messageId: event?.messageId,
      messageType: event?.type,
      metadata: {
        transport: delivery.transport,
        transportMessageId: delivery.transportMessageId,
        deliveryAttempt: delivery.deliveryAttempt,
      },
      error,
    }));

    return { action: 'discard', reason: error.message, error };
  }
}
