// packages/server/src/gateway/auth/api-key.ts
import type { AuthResult, Permission } from '../rpc/types.js';
import { secretFingerprint, secretsMatch } from './server-token.js';

/** Every configured control-plane key carries the full operator set */
export const API_KEY_PERMISSIONS: readonly Permission[] = [
  'servers:read',
  'servers:control',
  'binding:manage',
  'command:execute',
];

/**
 * Match a presented key against `control.apiKeys`.
 * Every key is compared, so the time taken does not reveal which one matched.
 */
export function validateApiKey(key: string, allowedKeys: readonly string[]): AuthResult {
  let found = false;
  for (const allowed of allowedKeys) {
    found = secretsMatch(key, allowed) || found;
  }

  if (!found) {
    return { ok: false, error: 'Invalid API key', code: 401 };
  }

  return {
    ok: true,
    info: { level: 'api_key', clientId: secretFingerprint(key), permissions: API_KEY_PERMISSIONS },
  };
}
