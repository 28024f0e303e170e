// packages/config/src/env-substitution.ts
import type { Env } from '@blockbridge/infra';
import { MissingEnvVarError } from './errors.js';

// `$${VAR}` is an escape; `${VAR}` a reference. Upper-case names only.
const REFERENCE = /(\$?)\$\{([A-Z_][A-Z0-9_]*)\}/g;

/**
 * Replace `${VAR}` in every string of a parsed config, single pass.
 * An unset or empty variable throws, naming the config key that used it.
 */
export function resolveEnvVars(value: unknown, env: Env = process.env, at: readonly string[] = []): unknown {
  if (typeof value === 'string') {
    return value.includes('${') ? substitute(value, env, at) : value;
  }
  if (Array.isArray(value)) {
    return value.map((item, i) => resolveEnvVars(item, env, [...at, String(i)]));
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = resolveEnvVars(v, env, [...at, k]);
    }
    return result;
  }
  return value;
}

function substitute(str: string, env: Env, at: readonly string[]): string {
  return str.replace(REFERENCE, (_match, escape: string, name: string) => {
    if (escape) {
      return `\${${name}}`;
    }
    const value = env[name];
    if (value === undefined || value === '') {
      throw new MissingEnvVarError(name, at.join('.'));
    }
    return value;
  });
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype
  );
}
