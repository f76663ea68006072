import { StacheError, ErrorSeverity, type BaseErrorDetails } from './StacheError';
import type { SourceLocation } from '@core/types/location';

export interface StructureErrorDetails extends BaseErrorDetails {
  /** Section names involved, innermost last */
  sections: string[];
  /** Name of the section the close tag was expected to match */
  expected?: string;
}

/**
 * Raised when section tags do not nest: a close tag without an open, a close
 * tag whose name differs from the innermost open section, or sections left
 * open at the end of the template.
 */
export class StructureError extends StacheError {
  constructor(
    message: string,
    options: {
      details: StructureErrorDetails;
      sourceLocation?: SourceLocation;
    }
  ) {
    super(message, {
      code: 'E_TEMPLATE_STRUCTURE',
      severity: ErrorSeverity.Fatal,
      details: options.details,
      sourceLocation: options.sourceLocation
    });
  }
}
