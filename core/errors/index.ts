/**
 * Central export point for stache error types.
 */
export { StacheError, ErrorSeverity } from './StacheError';
export type { BaseErrorDetails, StacheErrorOptions, SerializedStacheError } from './StacheError';
export { StructureError } from './StructureError';
export type { StructureErrorDetails } from './StructureError';
export { ConfigError } from './ConfigError';
export type { ConfigErrorDetails } from './ConfigError';
export { NotFoundError } from './NotFoundError';
export type { NotFoundErrorDetails } from './NotFoundError';
export { ExtractionError } from './ExtractionError';
