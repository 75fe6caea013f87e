import { ToolError, ErrorSeverity } from '@core/errors/ToolError';

export interface ConfigurationErrorOptions {
  /** Key of the configuration entry at fault, if any */
  key?: string;
  /** Config file the entry came from */
  filePath?: string;
  code?: string;
  cause?: unknown;
}

/**
 * Error thrown when tool configuration is missing or cannot be applied.
 */
export class ConfigurationError extends ToolError {
  public readonly key?: string;
  public readonly filePath?: string;

  constructor(message: string, options: ConfigurationErrorOptions = {}) {
    const fileStr = options.filePath ? ` (in ${options.filePath})` : '';

    super(`${message}${fileStr}`, {
      code: options.code || 'CONFIGURATION_ERROR',
      severity: ErrorSeverity.Fatal,
      cause: options.cause,
      details: {
        key: options.key,
        filePath: options.filePath
      }
    });

    this.name = 'ConfigurationError';
    this.key = options.key;
    this.filePath = options.filePath;

    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * A data entry was declared without a key.
 */
export class NullKeyError extends ConfigurationError {
  constructor(description: string) {
    super(`No key set for ${description}`, { code: 'NULL_KEY' });

    this.name = 'NullKeyError';

    Object.setPrototypeOf(this, NullKeyError.prototype);
  }
}
