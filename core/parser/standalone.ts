/**
 * Standalone-line detection for structural tags
 */

export interface TrimSpan {
  /** First character of the line holding the tag */
  start: number;
  /** One past the line's trailing newline, or the end of the text */
  end: number;
}

/**
 * Bounds of the line containing `[start, end)`, newlines excluded.
 */
export function findLineBounds(text: string, start: number, end: number): { lineStart: number; lineEnd: number } {
  const lineStart = start === 0 ? 0 : text.lastIndexOf('\n', start - 1) + 1;
  const next = text.indexOf('\n', end);
  return { lineStart, lineEnd: next === -1 ? text.length : next };
}

/**
 * If the tag spanning `[start, end)` has only whitespace around it on its
 * line, return the span covering the whole line and its newline.
 * Works on the original text, so every tag is judged independently of
 * what earlier tags removed.
 */
export function findStandaloneSpan(text: string, start: number, end: number): TrimSpan | undefined {
  const { lineStart, lineEnd } = findLineBounds(text, start, end);
  const before = text.slice(lineStart, start);
  const after = text.slice(end, lineEnd);

  if (before.trim() !== '' || after.trim() !== '') {
    return undefined;
  }

  return {
    start: lineStart,
    end: lineEnd < text.length ? lineEnd + 1 : lineEnd
  };
}

/**
 * Drop the indentation a standalone tag leaves at the tail of the text
 * emitted before it: everything after the last newline.
 */
export function cutToLastNewline(content: string): string {
  const cut = content.lastIndexOf('\n');
  return cut === -1 ? '' : content.slice(0, cut + 1);
}
