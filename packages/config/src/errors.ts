// packages/config/src/errors.ts
import { BlockBridgeError } from '@blockbridge/infra';

/** Base config error */
export class ConfigError extends BlockBridgeError {
  constructor(message: string, opts?: { cause?: Error; details?: Record<string, unknown> }) {
    super(message, 'CONFIG_ERROR', opts);
    this.name = 'ConfigError';
  }
}

/** `${VAR}` referenced a variable that is not set */
export class MissingEnvVarError extends ConfigError {
  constructor(
    readonly variable: string,
    /** Dotted config key holding the reference; empty at the root */
    readonly configPath = '',
  ) {
    super(`Environment variable not set: ${variable}${configPath ? ` (at ${configPath})` : ''}`, {
      details: { variable, configPath },
    });
    this.name = 'MissingEnvVarError';
  }
}

/** Schema validation failed */
export class ConfigValidationError extends ConfigError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, { details });
    this.name = 'ConfigValidationError';
  }
}
