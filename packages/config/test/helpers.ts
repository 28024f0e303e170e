// packages/config/test/helpers.ts
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

/** Run `fn` with a throwaway home directory, removed afterwards */
export async function withTempHome<T>(fn: (tmpHome: string) => T | Promise<T>): Promise<T> {
  const tmpHome = fs.mkdtempSync(path.join(os.tmpdir(), 'blockbridge-home-'));
  try {
    return await fn(tmpHome);
  } finally {
    fs.rmSync(tmpHome, { recursive: true, force: true });
  }
}
