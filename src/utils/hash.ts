import { createHash } from 'node:crypto';

/**
 * sha256 of text content, hex encoded
 */
export function hashContent(content: string): string {
  return createHash('sha256').update(content, 'utf-8').digest('hex');
}
