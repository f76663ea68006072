import { StacheError, ErrorSeverity, type BaseErrorDetails } from './StacheError';

export interface ConfigErrorDetails extends BaseErrorDetails {
  /** Config key or file involved, when there is one */
  setting?: string;
  filePath?: string;
}

/**
 * Raised when something the render needs was not configured, or a config
 * file could not be understood.
 */
export class ConfigError extends StacheError {
  constructor(
    message: string,
    options: {
      details?: ConfigErrorDetails;
      cause?: unknown;
    } = {}
  ) {
    super(message, {
      code: 'E_CONFIG',
      severity: ErrorSeverity.Fatal,
      details: options.details,
      cause: options.cause
    });
  }
}
