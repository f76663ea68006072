import type { SourceLocation } from '@core/types/location';

export interface FormattedLocation {
  readonly display: string;
  readonly file?: string;
  readonly line?: number;
  readonly column?: number;
}

export function formatLocation(location: SourceLocation | undefined): FormattedLocation {
  if (!location) {
    return { display: 'unknown location' };
  }

  if (location.filePath) {
    return {
      display: `${location.filePath}:${location.line}:${location.column}`,
      file: location.filePath,
      line: location.line,
      column: location.column
    };
  }

  return {
    display: `line ${location.line}, column ${location.column}`,
    line: location.line,
    column: location.column
  };
}

export function formatLocationForError(location: SourceLocation | undefined): string {
  return formatLocation(location).display;
}
