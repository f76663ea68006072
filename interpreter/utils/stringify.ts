import type { StructuredValue } from '@core/types/values';

/**
 * String form of a resolved value for interpolation. Absent and null
 * values render as the empty string; collections render as JSON.
 */
export function stringifyValue(value: StructuredValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}
