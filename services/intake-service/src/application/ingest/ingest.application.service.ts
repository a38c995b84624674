import {
  Inject,
  Injectable,
  InternalServerErrorException,
  Logger,
  UnsupportedMediaTypeException,
} from '@nestjs/common';
import {
  createEnvelope,
  deriveStableId,
  ensureCorrelationId,
  formatJsonLogLine,
  generateId,
  type LogRecordAcceptedEvent,
} from '@log-ingest/shared';
import { normalizeLogRecord, type IngestRequest } from '../../domain/ingest/normalize-log-record';
import { ValidationError } from '../../domain/ingest/validation.error';
import { IntakeServiceConfigService } from '../../infrastructure/config/intake-service-config.service';
import { LOG_RECORD_PUBLISHER, type LogRecordPublisher } from './ports/log-record-publisher.port';

const SERVICE_NAME = 'intake-service';

export interface IngestInput {
  contentType?: string;
  body: string;
  tenantIdHeader?: string;
  idempotencyKey?: string;
  correlationId?: string;
}

export interface IngestAcceptedResponse {
  status: 'accepted';
  message_id: string;
  tenant_id: string;
  log_id: string;
}

@Injectable()
export class IngestApplicationService {
  private readonly logger = new Logger(IngestApplicationService.name);

  constructor(
    @Inject(LOG_RECORD_PUBLISHER)
    private readonly publisher: LogRecordPublisher,
    private readonly config: IntakeServiceConfigService,
  ) {}

  async ingest(input: IngestInput): Promise<IngestAcceptedResponse> {
    const correlationId = ensureCorrelationId(input.correlationId);
    const request = toIngestRequest(input);
    const idempotencyKey = input.idempotencyKey?.trim();

    const record = normalizeLogRecord(request, {
      receivedAt: new Date().toISOString(),
      maxTextLength: this.config.maxTextLength,
      // Same key from the same tenant always maps to the same storage key.
      generateLogId: (tenantId) => (idempotencyKey ? deriveStableId(tenantId, idempotencyKey) : generateId()),
    });

    const event: LogRecordAcceptedEvent = createEnvelope({
      messageId: generateId(),
      type: 'LogRecordAccepted.v1',
      producer: SERVICE_NAME,
      correlationId,
      occurredAt: record.receivedAt,
      payload: record,
    });

    let messageId: string;
    try {
      ({ messageId } = await this.publisher.publish(event));
    } catch (error) {
      this.logger.error(formatJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'Failed to enqueue accepted log record.',
        correlationId,
        messageId: event.messageId,
        messageType: event.type,
        tenantId: record.tenantId,
        logId: record.logId,
        error,
      }));
      throw new InternalServerErrorException('Failed to enqueue log record; retry the request.');
    }

    this.logger.log(formatJsonLogLine({
      level: 'info',
      service: SERVICE_NAME,
      message: 'Log record accepted.',
      correlationId,
      messageId,
      messageType: event.type,
      tenantId: record.tenantId,
      logId: record.logId,
      metadata: { source: record.source, charCount: record.text.length },
    }));

    return {
      status: 'accepted',
      message_id: messageId,
      tenant_id: record.tenantId,
      log_id: record.logId,
    };
  }
}

function toIngestRequest(input: IngestInput): IngestRequest {
  const mediaType = parseMediaType(input.contentType);

  if (mediaType === 'application/json') {
    return { kind: 'structured', body: parseJsonBody(input.body) };
  }

  if (mediaType === 'text/plain') {
    return { kind: 'text', body: input.body, tenantIdHeader: input.tenantIdHeader };
  }

  throw new UnsupportedMediaTypeException(`Unsupported content type: ${input.contentType?.trim() || 'none'}`);
}

export function parseMediaType(contentType: string | undefined): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    throw new ValidationError('body', 'Invalid JSON payload');
  }
}
