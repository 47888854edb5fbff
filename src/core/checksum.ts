import { createHash } from 'crypto';

/**
 * sha256 hex digest of a buffer or string
 */
export function sha256(content: Buffer | string): string {
  return createHash('sha256').update(content).digest('hex');
}
