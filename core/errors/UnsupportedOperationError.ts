import { ToolError, ErrorSeverity } from '@core/errors/ToolError';

export class UnsupportedOperationError extends ToolError {
  public readonly operation: string;

  constructor(operation: string, tool?: string) {
    super(`${operation} is not currently supported`, {
      code: 'UNSUPPORTED_OPERATION',
      severity: ErrorSeverity.Fatal,
      details: { tool, operation }
    });

    this.name = 'UnsupportedOperationError';
    this.operation = operation;

    Object.setPrototypeOf(this, UnsupportedOperationError.prototype);
  }
}
