import * as path from 'node:path';
import { describe, it, expect } from 'vitest';
import { resolveStatePaths } from '../src/paths.js';

describe('resolveStatePaths', () => {
  it('defaults to ~/.blockbridge', () => {
    const home = path.join(path.sep, 'home', 'steve');
    expect(resolveStatePaths({}, () => home)).toEqual({
      stateDir: path.join(home, '.blockbridge'),
      configFile: path.join(home, '.blockbridge', 'config', 'blockbridge.json5'),
      logDir: path.join(home, '.blockbridge', 'logs'),
    });
  });

  it('honours BLOCKBRIDGE_STATE_DIR', () => {
    const paths = resolveStatePaths({ BLOCKBRIDGE_STATE_DIR: '/srv/blockbridge' }, () => '/nowhere');
    expect(paths.stateDir).toBe('/srv/blockbridge');
    expect(paths.configFile).toBe(path.join('/srv/blockbridge', 'config', 'blockbridge.json5'));
    expect(paths.logDir).toBe(path.join('/srv/blockbridge', 'logs'));
  });

  it('ignores a blank BLOCKBRIDGE_STATE_DIR', () => {
    expect(resolveStatePaths({ BLOCKBRIDGE_STATE_DIR: ' ' }, () => '/home/alex').stateDir).toBe(
      path.join('/home/alex', '.blockbridge'),
    );
  });
});
