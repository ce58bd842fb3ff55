import { randomUUID } from 'crypto';

/** Short prefixed identifier, e.g. `job_3f9a1c0d7e2b4a61`. */
export function generateId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, '').slice(0, 16)}`;
}
