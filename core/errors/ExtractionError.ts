import { StacheError, ErrorSeverity, type BaseErrorDetails } from './StacheError';

/**
 * Error thrown when resume Markdown lacks the structure the extractor needs.
 */
export class ExtractionError extends StacheError {
  constructor(message: string, details?: BaseErrorDetails) {
    super(message, {
      code: 'E_EXTRACTION',
      severity: ErrorSeverity.Fatal,
      details
    });
  }
}
