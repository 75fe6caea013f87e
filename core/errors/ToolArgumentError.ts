import { ToolError, ErrorSeverity, type BaseErrorDetails } from '@core/errors/ToolError';

/**
 * Invalid arguments detected while constructing a tool object.
 */
export class ToolArgumentError extends ToolError {
  constructor(message: string, details?: BaseErrorDetails) {
    super(message, {
      code: 'INVALID_ARGUMENT',
      severity: ErrorSeverity.Fatal,
      details
    });

    this.name = 'ToolArgumentError';

    Object.setPrototypeOf(this, ToolArgumentError.prototype);
  }
}
