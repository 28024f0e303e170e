// packages/infra/src/runtime-guard.ts

/** process.loadEnvFile() arrived in 20.12 */
const MINIMUM_NODE_VERSION: readonly [number, number] = [20, 12];

export function parseNodeVersion(version: string = process.versions.node): [major: number, minor: number] {
  const [major = '0', minor = '0'] = version.replace(/^v/, '').split('.');
  return [Number(major), Number(minor)];
}

export function isSupportedRuntime(version: string = process.versions.node): boolean {
  const [major, minor] = parseNodeVersion(version);
  const [minMajor, minMinor] = MINIMUM_NODE_VERSION;
  return major > minMajor || (major === minMajor && minor >= minMinor);
}

/** Exit with a message on an unsupported Node.js. Tests spy on process.exit. */
export function assertSupportedRuntime(): void {
  if (!isSupportedRuntime()) {
    console.error(
      `BlockBridge requires Node.js ${MINIMUM_NODE_VERSION.join('.')} or later.\n` +
        `Current version: ${process.versions.node}`,
    );
    process.exit(1);
  }
}
