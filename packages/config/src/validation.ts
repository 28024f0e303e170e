// packages/config/src/validation.ts
import type { BlockBridgeConfig, ConfigValidationIssue } from '@blockbridge/types';
import { ConfigValidationError } from './errors.js';
import { BlockBridgeConfigSchema } from './zod-schema.js';

export type ValidationResult =
  | { valid: true; config: BlockBridgeConfig; issues: [] }
  | { valid: false; issues: ConfigValidationIssue[] };

/** Validate raw input; failures come back as issues with dotted paths */
export function validateConfig(raw: unknown): ValidationResult {
  const result = BlockBridgeConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data, issues: [] };
  }

  const issues = result.error.issues.map(
    (issue): ConfigValidationIssue => ({
      path: formatPath(issue.path),
      message: issue.message,
      severity: 'error',
    }),
  );
  return { valid: false, issues };
}

/** Throwing variant */
export function validateConfigStrict(raw: unknown): BlockBridgeConfig {
  const result = validateConfig(raw);
  if (!result.valid) {
    throw new ConfigValidationError(
      `Config validation failed: ${result.issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      { issues: result.issues },
    );
  }
  return result.config;
}

/** ['servers', 'Survival', 'url'] → servers.Survival.url, numeric keys as [n] */
export function formatPath(path: readonly PropertyKey[]): string {
  let out = '';
  for (const segment of path) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out += out ? `.${String(segment)}` : String(segment);
    }
  }
  return out || '(root)';
}
