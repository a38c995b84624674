export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
  cause?: SerializedError;
}

export interface JsonLogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  correlationId: string;
  causationId?: string;
  messageId?: string;
  messageType?: string;
  routingKey?: string;
  queue?: string;
  tenantId?: string;
  logId?: string;
  metadata?: Record<string, unknown>;
  error?: SerializedError;
}

export interface CreateJsonLogEntryInput {
  level: LogLevel;
  service: string;
  message: string;
  correlationId?: string;
  causationId?: string;
  messageId?: string;
  messageType?: string;
  routingKey?: string;
  queue?: string;
  tenantId?: string;
  logId?: string;
  metadata?: Record<string, unknown>;
  error?: unknown;
  timestamp?: string;
}

// Entries without a request or message in scope (boot, pool errors) use this id.
export const SYSTEM_CORRELATION_ID = 'system';

export function serializeError(error: unknown): SerializedError | undefined {
  if (error == null) {
    return undefined;
  }

  if (error instanceof Error) {
    const cause = error.cause === undefined ? undefined : serializeError(error.cause);
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...(cause ? { cause } : {}),
    };
  }

  if (typeof error === 'string') {
    return {
      name: 'Error',
      message: error,
    };
  }

  return {
    name: 'UnknownError',
    message: safeSerializeUnknown(error),
  };
}

function safeSerializeUnknown(value: unknown): string {
  try {
    const serialized = JSON.stringify(value);
    if (serialized !== undefined) {
      return serialized;
    }
  } catch {
    return String(value);
  }

  return String(value);
}

export function createJsonLogEntry(input: CreateJsonLogEntryInput): JsonLogEntry {
  return {
    timestamp: input.timestamp ?? new Date().toISOString(),
    level: input.level,
    service: input.service,
    message: input.message,
    correlationId: input.correlationId ?? SYSTEM_CORRELATION_ID,
    causationId: input.causationId,
    messageId: input.messageId,
    messageType: input.messageType,
    routingKey: input.routingKey,
    queue: input.queue,
    tenantId: input.tenantId,
    logId: input.logId,
    metadata: input.metadata,
    error: serializeError(input.error),
  };
}

export function formatJsonLogLine(input: CreateJsonLogEntryInput): string {
  return JSON.stringify(createJsonLogEntry(input));
}
