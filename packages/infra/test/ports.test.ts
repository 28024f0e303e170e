import * as net from 'node:net';
import { describe, it, expect } from 'vitest';
import { PortInUseError } from '../src/errors.js';
import { assertPortAvailable, isValidPort } from '../src/ports.js';

describe('assertPortAvailable', () => {
  it('throws PortInUseError for a bound port', async () => {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;

    try {
      await expect(assertPortAvailable(port, '127.0.0.1')).rejects.toThrow(
        `Port ${port} is already in use on 127.0.0.1`,
      );
      await expect(assertPortAvailable(port, '127.0.0.1')).rejects.toBeInstanceOf(PortInUseError);
    } finally {
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
  });

  it('releases a free port after probing', async () => {
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    const port = typeof address === 'object' && address ? address.port : 0;
    await new Promise<void>((resolve) => server.close(() => resolve()));

    await assertPortAvailable(port, '127.0.0.1');
    await expect(assertPortAvailable(port, '127.0.0.1')).resolves.toBeUndefined();
  });

  it('skips the probe for port 0', async () => {
    await expect(assertPortAvailable(0)).resolves.toBeUndefined();
  });
});

describe('isValidPort', () => {
  it.each([
    [1, true],
    [8765, true],
    [65535, true],
    [0, false],
    [65536, false],
    [1.5, false],
    [NaN, false],
  ])('isValidPort(%s) → %s', (port, expected) => {
    expect(isValidPort(port)).toBe(expected);
  });
});
