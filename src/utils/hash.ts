import { createHash } from 'crypto';

/** Lowercase hex SHA-256 of `bytes`. */
export function sha256Hex(bytes: Buffer): string {
  return createHash('sha256').update(bytes).digest('hex');
}
