// packages/config/src/types.ts
import type { BlockBridgeLogger, Env } from '@blockbridge/infra';

/** Dependencies injected into createConfigIO(); every member has a default */
export interface ConfigDeps {
  fs?: { readFileSync(path: string, encoding: 'utf-8'): string };
  json5?: { parse(text: string): unknown };
  env?: Env;
  homedir?: () => string;
  configPath?: string;
  cacheTtlMs?: number;
  logger?: Pick<BlockBridgeLogger, 'error' | 'warn' | 'info' | 'debug'>;
}
