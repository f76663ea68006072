import { StacheError, ErrorSeverity, type BaseErrorDetails } from './StacheError';
import type { SourceLocation } from '@core/types/location';

/**
 * Represents details specific to file not found errors.
 */
export interface NotFoundErrorDetails extends BaseErrorDetails {
  /** Every path that was tried, in order */
  searched: string[];
  operation?: 'partial' | 'read';
}

/**
 * Error thrown when a required file cannot be found.
 */
export class NotFoundError extends StacheError {
  constructor(
    message: string,
    options: {
      details: NotFoundErrorDetails;
      sourceLocation?: SourceLocation;
      cause?: unknown;
    }
  ) {
    super(message, {
      code: 'E_NOT_FOUND',
      severity: ErrorSeverity.Fatal,
      details: options.details,
      sourceLocation: options.sourceLocation,
      cause: options.cause
    });
  }
}
