export const MESSAGE_EXCHANGES = {
  logs: 'logs.ingest',
} as const;

export const SERVICE_QUEUES = {
  logWorker: 'q.log-worker',
} as const;

export const DEFAULT_QUEUE_BINDINGS = {
  [SERVICE_QUEUES.logWorker]: ['logs.record.accepted.*'],
} as const;

export const DELIVERY_CHANNEL_DEFAULTS = {
  ackDeadlineMs: 60_000,
  retentionWindowMs: 7 * 24 * 60 * 60 * 1000,
} as const;
