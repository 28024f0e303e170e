// packages/infra/src/ports.ts
import * as net from 'node:net';
import { PortInUseError } from './errors.js';

export function isValidPort(port: number): boolean {
  return Number.isInteger(port) && port >= 1 && port <= 65535;
}

/**
 * Probe the listen address before the gateway binds it, so a clash is
 * reported as PortInUseError instead of a late EADDRINUSE.
 * Port 0 asks the OS for a free port and is never probed.
 */
export async function assertPortAvailable(port: number, host = '0.0.0.0'): Promise<void> {
  if (port === 0) {
    return;
  }

  const probe = net.createServer();
  try {
    await new Promise<void>((resolve, reject) => {
      probe.once('error', reject);
      probe.listen({ port, host, exclusive: true }, () => resolve());
    });
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EADDRINUSE') {
      throw new PortInUseError(port, host);
    }
    throw err;
  }
  await new Promise<void>((resolve) => probe.close(() => resolve()));
}
