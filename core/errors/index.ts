/**
 * Central export point for tool error types.
 */
export { ToolError, ErrorSeverity, type BaseErrorDetails, type ToolErrorOptions } from './ToolError';
export { IteratorExhaustedError } from './IteratorExhaustedError';
export { UnsupportedOperationError } from './UnsupportedOperationError';
export { ToolArgumentError } from './ToolArgumentError';
export { ConfigurationError, NullKeyError, type ConfigurationErrorOptions } from './ConfigurationError';
export { DataConversionError } from './DataConversionError';
