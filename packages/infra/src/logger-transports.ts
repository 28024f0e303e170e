// packages/infra/src/logger-transports.ts
import * as fs from 'node:fs';
import * as path from 'node:path';
import { resolveStatePaths } from './paths.js';

export interface FileTransportConfig {
  enabled: boolean;
  /** Directory; default <state dir>/logs */
  path?: string;
  maxSizeMb?: number; // default 10
  maxFiles?: number; // default 5
}

const LOG_FILE_NAME = 'blockbridge.log';

/** JSON-lines file that rotates to .1 .. .N-1 once it passes maxBytes */
class RotatingFileSink {
  private stream: fs.WriteStream;
  private size: number;

  constructor(
    readonly file: string,
    private readonly maxBytes: number,
    private readonly maxFiles: number,
  ) {
    this.size = fs.existsSync(file) ? fs.statSync(file).size : 0;
    this.stream = this.open();
  }

  write(entry: unknown): void {
    const line = JSON.stringify(entry) + '\n';
    const bytes = Buffer.byteLength(line);
    if (this.size > 0 && this.size + bytes > this.maxBytes) {
      this.rotate();
    }
    this.stream.write(line);
    this.size += bytes;
  }

  end(): Promise<void> {
    return new Promise((resolve) => {
      if (this.stream.writableFinished) {
        resolve();
      } else {
        this.stream.end(resolve);
      }
    });
  }

  private open(): fs.WriteStream {
    return fs.createWriteStream(this.file, { flags: 'a', mode: 0o600 });
  }

  private rotate(): void {
    this.stream.end();
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const from = i === 1 ? this.file : `${this.file}.${i - 1}`;
      if (fs.existsSync(from)) {
        fs.renameSync(from, `${this.file}.${i}`);
      }
    }
    this.stream = this.open();
    this.size = 0;
  }
}

/**
 * Attach the rotating file sink to tslog.
 * Returns the flush callback used on shutdown, or undefined when disabled.
 */
export function attachFileTransport(
  logger: { attachTransport: (fn: (logObj: unknown) => void) => void },
  config: FileTransportConfig,
): (() => Promise<void>) | undefined {
  if (!config.enabled) {
    return undefined;
  }

  const logDir = config.path ?? resolveStatePaths().logDir;
  fs.mkdirSync(logDir, { recursive: true });

  const sink = new RotatingFileSink(
    path.join(logDir, LOG_FILE_NAME),
    (config.maxSizeMb ?? 10) * 1024 * 1024,
    config.maxFiles ?? 5,
  );
  logger.attachTransport((logObj) => sink.write(logObj));
  return () => sink.end();
}
