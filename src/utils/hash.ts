import { createHash } from 'node:crypto';

export function sha256Hex(value: string): string {
  return createHash('sha256').update(value).digest('hex');
}

// Short, stable fingerprint for log lines and audit events; never log the secret itself.
export function hashForLogging(secret: string): string {
  return sha256Hex(secret).substring(0, 16);
}
