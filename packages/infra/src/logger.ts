// packages/infra/src/logger.ts
import { LOG_LEVELS, type LogLevel } from '@blockbridge/types';
import { Logger as TsLogger } from 'tslog';
import { getContext } from './context.js';
import { isTruthyEnvValue } from './env.js';
import { attachFileTransport, type FileTransportConfig } from './logger-transports.js';

export interface LoggerConfig {
  name: string;
  level?: LogLevel;
  file?: FileTransportConfig;
  console?: {
    enabled: boolean;
    /** Defaults to true outside CI */
    pretty?: boolean;
  };
  /** Keys whose values are masked; [] disables masking */
  redactKeys?: string[];
  /** Prepend the active request context to every entry (default true) */
  autoInjectContext?: boolean;
}

type LogMethod = (msg: string, ...args: unknown[]) => void;

export type BlockBridgeLogger = Record<LogLevel, LogMethod> & {
  child(name: string): BlockBridgeLogger;
  /** Resolves once buffered file output is written */
  flush(): Promise<void>;
};

export const DEFAULT_REDACT_KEYS = [
  'token',
  'tokens',
  'password',
  'secret',
  'apiKey',
  'apiKeys',
  'api_key',
  'authorization',
  'cookie',
];

/** tslog numbers its levels from 1 (silly=0 is unused) */
function tslogLevel(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level) + 1;
}

function outputType(config: LoggerConfig): 'pretty' | 'json' | 'hidden' {
  if (config.console?.enabled === false) {
    return 'hidden';
  }
  const pretty = config.console?.pretty ?? !isTruthyEnvValue(process.env.CI);
  return pretty ? 'pretty' : 'json';
}

export function createLogger(config: LoggerConfig): BlockBridgeLogger {
  const root = new TsLogger<unknown>({
    name: config.name,
    minLevel: tslogLevel(config.level ?? 'info'),
    type: outputType(config),
    maskValuesOfKeys: config.redactKeys ?? DEFAULT_REDACT_KEYS,
    maskValuesOfKeysCaseInsensitive: true,
    hideLogPositionForProduction: true,
  });

  const flushers: (() => Promise<void>)[] = [];
  const flushFile = config.file?.enabled ? attachFileTransport(root, config.file) : undefined;
  if (flushFile) {
    flushers.push(flushFile);
  }

  return bind(root, config.autoInjectContext ?? true, flushers);
}

function bind(tsLogger: TsLogger<unknown>, injectContext: boolean, flushers: (() => Promise<void>)[]): BlockBridgeLogger {
  const contextual = (args: unknown[]): unknown[] => {
    const ctx = injectContext ? getContext() : undefined;
    return ctx ? [{ _ctx: { requestId: ctx.requestId, serverId: ctx.serverId } }, ...args] : args;
  };

  const method =
    (level: LogLevel): LogMethod =>
    (msg, ...args) => {
      tsLogger[level](msg, ...contextual(args));
    };

  return {
    trace: method('trace'),
    debug: method('debug'),
    info: method('info'),
    warn: method('warn'),
    error: method('error'),
    fatal: method('fatal'),
    // sub-loggers reuse the parent's transports, hence its flushers
    child: (name) => bind(tsLogger.getSubLogger({ name }), injectContext, flushers),
    flush: async () => {
      await Promise.all(flushers.map((flush) => flush()));
    },
  };
}

/** Mask credentials carried in a URL query string before it is logged */
export function redactUrl(url: string): string {
  return url.replace(/([?&](?:token|apiKey|key|secret)=)[^&#]*/gi, '$1***');
}
