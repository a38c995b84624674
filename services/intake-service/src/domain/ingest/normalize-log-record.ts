import {
  countCharacters,
  isRecord,
  isValidLogId,
  isValidTenantId,
  LOG_ID_RULE,
  TENANT_ID_RULE,
  type CanonicalLogRecord,
} from '@log-ingest/shared';
import { ValidationError } from './validation.error';

export type IngestRequest =
  | { kind: 'structured'; body: unknown }
  | { kind: 'text'; body: string; tenantIdHeader?: string };

export interface NormalizeLogRecordOptions {
  /** Called at most once, and only after every other field has validated. */
  generateLogId(tenantId: string): string;
  receivedAt: string;
  maxTextLength: number;
}

interface EmbeddedFields {
  tenantId?: string;
  logId?: string;
  text: string;
}

const EMBEDDED_FIELD_PATTERN = /^\s*(tenant_id|log_id|data|text)\s*:\s?(.*)$/i;

export function normalizeLogRecord(
  request: IngestRequest,
  options: NormalizeLogRecordOptions,
): CanonicalLogRecord {
  return request.kind === 'structured'
    ? normalizeStructured(request.body, options)
    : normalizeText(request.body, request.tenantIdHeader, options);
}

function normalizeStructured(body: unknown, options: NormalizeLogRecordOptions): CanonicalLogRecord {
  if (!isRecord(body)) {
    throw new ValidationError('body', 'JSON payload must be an object');
  }

  const tenantId = requireTenantId(body.tenant_id, 'Missing tenant_id in JSON payload');

  // `data` is accepted as an alias; `text` wins when both are present.
  const rawText = body.text !== undefined ? body.text : body.data;
  if (rawText === undefined || rawText === null) {
    throw new ValidationError('text', 'Missing text in JSON payload');
  }
  if (typeof rawText !== 'string') {
    throw new ValidationError('text', 'text must be a string');
  }

  const text = checkTextLength(rawText, options.maxTextLength);
  const logId = readLogId(body.log_id) ?? options.generateLogId(tenantId);

  return {
    tenantId,
    logId,
    text,
    source: 'structured_upload',
    receivedAt: options.receivedAt,
  };
}

function normalizeText(
  body: string,
  tenantIdHeader: string | undefined,
  options: NormalizeLogRecordOptions,
): CanonicalLogRecord {
  const embedded = parseEmbeddedFields(body);
  const headerTenantId = nonBlank(tenantIdHeader);
  const embeddedTenantId = nonBlank(embedded.tenantId);

  if (headerTenantId && embeddedTenantId && headerTenantId !== embeddedTenantId) {
    throw new ValidationError('tenant_id', 'tenant_id in body does not match X-Tenant-ID header');
  }

  const tenantId = requireTenantId(
    headerTenantId ?? embeddedTenantId,
    'Missing tenant_id: send an X-Tenant-ID header or a leading "tenant_id:" line',
  );
  const text = checkTextLength(embedded.text, options.maxTextLength);
  const logId = readLogId(embedded.logId) ?? options.generateLogId(tenantId);

  return {
    tenantId,
    logId,
    text,
    source: 'text_upload',
    receivedAt: options.receivedAt,
  };
}

/**
 * Leading `tenant_id:` / `log_id:` lines are metadata. A `data:` or `text:` line starts the
 * payload, which runs to the end of the body. A body with no leading key lines is taken verbatim.
 */
export function parseEmbeddedFields(body: string): EmbeddedFields {
  const lines = body.split(/\r?\n/);
  const fields: Omit<EmbeddedFields, 'text'> = {};
  let index = 0;

  for (; index < lines.length; index += 1) {
    const match = EMBEDDED_FIELD_PATTERN.exec(lines[index]);
    if (!match) {
      break;
    }

    const key = match[1].toLowerCase();
    const value = match[2];

    if (key === 'data' || key === 'text') {
      return { ...fields, text: [value, ...lines.slice(index + 1)].join('\n') };
    }

    if (key === 'tenant_id') {
      fields.tenantId = value.trim();
    } else {
      fields.logId = value.trim();
    }
  }

  if (index === 0) {
    return { text: body };
  }

  return { ...fields, text: lines.slice(index).join('\n') };
}

function requireTenantId(value: unknown, missingMessage: string): string {
  if (value === undefined || value === null) {
    throw new ValidationError('tenant_id', missingMessage);
  }
  if (typeof value !== 'string') {
    throw new ValidationError('tenant_id', 'tenant_id must be a string');
  }

  const tenantId = value.trim();
  if (tenantId.length === 0) {
    throw new ValidationError('tenant_id', missingMessage);
  }
  if (!isValidTenantId(tenantId)) {
    throw new ValidationError('tenant_id', `tenant_id may only contain ${TENANT_ID_RULE}`);
  }

  return tenantId;
}

/** Returns undefined when the caller left log_id out, so one gets generated. */
function readLogId(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ValidationError('log_id', 'log_id must be a string');
  }

  const logId = value.trim();
  if (logId.length === 0) {
    return undefined;
  }
  if (!isValidLogId(logId)) {
    throw new ValidationError('log_id', `log_id may only contain ${LOG_ID_RULE}`);
  }

  return logId;
}

function checkTextLength(text: string, maxTextLength: number): string {
  if (countCharacters(text) > maxTextLength) {
    throw new ValidationError('text', `text exceeds maximum length of ${maxTextLength} characters`);
  }
  return text;
}

function nonBlank(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
