/**
 * Dotted-path lookup over a context stack
 */
import { isMapping, isSequence, type StructuredValue } from '@core/types/values';
import type { ContextStack } from '@interpreter/env/ContextStack';

const INDEX_PATTERN = /^\d+$/;

/**
 * Split a dotted path into its non-empty, trimmed segments.
 */
export function splitPath(path: string): string[] {
  return path
    .split('.')
    .map(segment => segment.trim())
    .filter(segment => segment.length > 0);
}

/**
 * Walk `segments` down from `value`. Returns undefined as soon as a segment
 * cannot be followed.
 */
export function walkSegments(value: StructuredValue, segments: string[]): StructuredValue | undefined {
  let current: StructuredValue = value;

  for (const segment of segments) {
    if (isMapping(current) && Object.hasOwn(current, segment)) {
      current = current[segment];
    } else if (isSequence(current) && INDEX_PATTERN.test(segment)) {
      const index = Number(segment);
      if (index >= current.length) {
        return undefined;
      }
      current = current[index];
    } else {
      return undefined;
    }
  }

  return current;
}

/**
 * Resolve `path` against the stack. `.` is the innermost scope; any other
 * path is tried against each scope from innermost to outermost and the first
 * scope that resolves every segment wins. Unresolvable paths give undefined.
 */
export function resolvePath(stack: ContextStack, path: string): StructuredValue | undefined {
  const trimmed = path.trim();
  if (trimmed === '.') {
    return stack.top;
  }

  const segments = splitPath(trimmed);
  if (segments.length === 0) {
    return undefined;
  }

  for (const scope of stack.scopes()) {
    const value = walkSegments(scope, segments);
    if (value !== undefined) {
      return value;
    }
  }

  return undefined;
}
