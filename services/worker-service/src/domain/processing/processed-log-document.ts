import {
  countCharacters,
  isLogRecordSource,
  isRecord,
  type CanonicalLogRecord,
  type LogRecordSource,
} from '@log-ingest/shared';

/** Persisted as-is, so the field names are the stored wire format. */
export interface ProcessedLogDocument {
  source: LogRecordSource;
  original_text: string;
  modified_data: string;
  processed_at: string;
  received_at: string;
  processing_time: number;
  char_count: number;
}

export interface BuildProcessedLogDocumentInput {
  record: CanonicalLogRecord;
  modifiedText: string;
  processingTimeSeconds: number;
  processedAt: Date;
}

export function buildProcessedLogDocument(input: BuildProcessedLogDocumentInput): ProcessedLogDocument {
  return {
    source: input.record.source,
    original_text: input.record.text,
    modified_data: input.modifiedText,
    processed_at: input.processedAt.toISOString(),
    received_at: input.record.receivedAt,
    processing_time: input.processingTimeSeconds,
    char_count: countCharacters(input.record.text),
  };
}

export function isProcessedLogDocument(value: unknown): value is ProcessedLogDocument {
  if (!isRecord(value)) {
    return false;
  }

  return (
    isLogRecordSource(value.source) &&
    typeof value.original_text === 'string' &&
    typeof value.modified_data === 'string' &&
    typeof value.processed_at === 'string' &&
    typeof value.received_at === 'string' &&
    typeof value.processing_time === 'number' &&
    typeof value.char_count === 'number'
  );
}
