import { ToolError, ErrorSeverity } from '@core/errors/ToolError';

/**
 * A configuration value could not be converted to its declared type.
 */
export class DataConversionError extends ToolError {
  public readonly targetType: string;
  public readonly value: unknown;

  constructor(targetType: string, value: unknown, message?: string, cause?: unknown) {
    super(message || `Cannot convert '${String(value)}' to ${targetType}`, {
      code: 'CONVERSION_FAILED',
      severity: ErrorSeverity.Recoverable,
      cause,
      details: { tool: 'data', targetType }
    });

    this.name = 'DataConversionError';
    this.targetType = targetType;
    this.value = value;

    Object.setPrototypeOf(this, DataConversionError.prototype);
  }
}
