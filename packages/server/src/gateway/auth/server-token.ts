// packages/server/src/gateway/auth/server-token.ts
import { createHash, timingSafeEqual } from 'node:crypto';

const digest = (value: string): Buffer => createHash('sha256').update(value).digest();

/** Constant-time comparison; both sides are hashed so lengths always match */
export function secretsMatch(presented: string, expected: string): boolean {
  return timingSafeEqual(digest(presented), digest(expected));
}

/** Game server token check; an unknown server is compared against a placeholder by the caller */
export const verifyServerToken = secretsMatch;

/** Short, non-reversible label for a secret, safe to log */
export function secretFingerprint(secret: string): string {
  return digest(secret).toString('hex').slice(0, 8);
}
