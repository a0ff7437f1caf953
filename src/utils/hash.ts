import { createHash } from 'node:crypto';

/**
 * First 16 hex chars of the SHA-256 of a prompt. Stable across processes,
 * unlike an in-memory string hash.
 */
export function hashPrompt(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex').slice(0, 16);
}
