import { createHash, randomUUID } from 'node:crypto';

export function generateId(): string {
  return randomUUID();
}

export function ensureCorrelationId(correlationId?: string | null): string {
  const trimmed = correlationId?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : generateId();
}

/**
 * UUID-shaped id derived from SHA-256 over the namespace parts, with the version nibble set
 * to 5 and the RFC 4122 variant bits. Same parts, same id.
 */
export function deriveStableId(...parts: string[]): string {
  const digest = createHash('sha256').update(parts.join('\u0000'), 'utf8').digest();
  const bytes = digest.subarray(0, 16);

  bytes[6] = (bytes[6] & 0x0f) | 0x50;
  bytes[8] = (bytes[8] & 0x3f) | 0x80;

  const hex = bytes.toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20, 32)}`;
}
