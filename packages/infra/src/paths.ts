// packages/infra/src/paths.ts
import * as os from 'node:os';
import * as path from 'node:path';
import { readEnv, type Env } from './env.js';

export interface StatePaths {
  /** BLOCKBRIDGE_STATE_DIR, else ~/.blockbridge */
  readonly stateDir: string;
  readonly configFile: string;
  readonly logDir: string;
}

export function resolveStatePaths(env: Env = process.env, homedir: () => string = os.homedir): StatePaths {
  const stateDir = readEnv(env, 'STATE_DIR') ?? path.join(homedir(), '.blockbridge');
  return {
    stateDir,
    configFile: path.join(stateDir, 'config', 'blockbridge.json5'),
    logDir: path.join(stateDir, 'logs'),
  };
}
