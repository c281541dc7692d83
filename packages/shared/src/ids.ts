import { randomUUID } from 'node:crypto';

/**
 * 128-bit random identifier rendered as a 36-character UUID token.
 */
export function generateId(): string {
  return randomUUID();
}

export function generateCorrelationId(): string {
  return generateId();
}

export function ensureCorrelationId(correlationId?: string): string {
  return correlationId && correlationId.trim().length > 0 ? correlationId.trim() : generateCorrelationId();
}
