import { createHash } from 'node:crypto';

/**
 * First 16 hex chars of SHA-256. Decision log entries keep this instead of the raw input.
 */
export function hashInput(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex').slice(0, 16);
}
