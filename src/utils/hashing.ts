import * as crypto from 'crypto';

/**
 * Lowercase hex SHA-256 digest, used to name files derived from URLs
 */
export function stableHash(value: string): string {
  return crypto.createHash('sha256').update(value, 'utf8').digest('hex');
}
