/**
 * Optional post-processing of rendered output
 */
import type { ResolvedOutputConfig } from '@core/config/types';

/**
 * Collapse three or more consecutive newlines to two, leaving at most one
 * blank line between blocks. `\r\n` line endings count as newlines.
 */
export function normalizeOutputBlankLines(content: string): string {
  return content.replace(/(?:\r?\n){3,}/g, match => (match.includes('\r') ? '\r\n\r\n' : '\n\n'));
}

/**
 * End non-empty content with exactly one newline.
 */
export function ensureTrailingNewline(content: string): string {
  if (content.length === 0) {
    return content;
  }
  return content.replace(/(?:\r?\n)*$/, '\n');
}

/**
 * Apply the post-processing steps enabled in `config`.
 */
export function normalizeOutput(content: string, config: ResolvedOutputConfig): string {
  let normalized = content;
  if (config.normalizeBlankLines) {
    normalized = normalizeOutputBlankLines(normalized);
  }
  if (config.trailingNewline) {
    normalized = ensureTrailingNewline(normalized);
  }
  return normalized;
}
