import { ToolError, ErrorSeverity } from '@core/errors/ToolError';

/**
 * Thrown when an iterator is advanced with no valid element left.
 * Always a caller bug: check hasNext() first.
 */
export class IteratorExhaustedError extends ToolError {
  public readonly iteratorName: string;

  constructor(iteratorName: string) {
    super('There are no more valid elements in this iterator', {
      code: 'ITERATOR_EXHAUSTED',
      severity: ErrorSeverity.Fatal,
      details: { tool: 'loop', iterator: iteratorName }
    });

    this.name = 'IteratorExhaustedError';
    this.iteratorName = iteratorName;

    Object.setPrototypeOf(this, IteratorExhaustedError.prototype);
  }
}
