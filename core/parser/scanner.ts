/**
 * Tag scanner: splits template text into literal text and classified tags,
 * removing standalone structural lines as it goes.
 */
import { LineIndex, type SourceLocation } from '@core/types/location';
import { isStructuralToken, type Token } from '@core/types/tokens';
import { findStandaloneSpan, cutToLastNewline } from './standalone';

// Triple form first so `{{{x}}}` is never read as `{{` + `{x` + `}}`.
const TAG_PATTERN = /\{\{\{\s*([^}]+?)\s*\}\}\}|\{\{\s*([^}]+?)\s*\}\}/g;

// Sigils of tag kinds this engine does not implement (delimiter changes,
// blocks, parents, pragmas) plus the stray brace of an unbalanced triple.
const UNSUPPORTED_SIGILS = new Set(['=', '<', '$', '%', '{']);

export interface ScanOptions {
  /** Recorded on token locations, for error messages */
  filePath?: string;
}

/**
 * Classify the body of a tag. Returns undefined for tags that should be
 * emitted as literal text.
 */
export function classifyTag(body: string, triple: boolean, location: SourceLocation): Token | undefined {
  const trimmed = body.trim();
  if (trimmed === '') {
    return undefined;
  }

  if (triple) {
    return { type: 'Variable', path: trimmed, escaped: false, location };
  }

  const sigil = trimmed[0];
  const name = trimmed.slice(1).trim();

  switch (sigil) {
    case '#':
      return { type: 'SectionOpen', name, location };
    case '^':
      return { type: 'InvertedOpen', name, location };
    case '/':
      return { type: 'SectionClose', name, location };
    case '!':
      return { type: 'Comment', location };
    case '>':
      return { type: 'Partial', name, location };
    case '&':
      return { type: 'Variable', path: name, escaped: false, location };
    default:
      if (UNSUPPORTED_SIGILS.has(sigil)) {
        return undefined;
      }
      return { type: 'Variable', path: trimmed, escaped: true, location };
  }
}

/**
 * Scan `text` into a flat token list.
 */
export function scanTemplate(text: string, options: ScanOptions = {}): Token[] {
  const tokens: Token[] = [];
  const lines = new LineIndex(text, options.filePath);
  const pattern = new RegExp(TAG_PATTERN.source, 'g');
  let pos = 0;
  let match: RegExpExecArray | null;

  while ((match = pattern.exec(text)) !== null) {
    const start = match.index;
    const end = start + match[0].length;
    const triple = match[1] !== undefined;
    const body = match[1] ?? match[2] ?? '';

    const emittedText = start > pos;
    if (emittedText) {
      tokens.push({ type: 'Text', content: text.slice(pos, start), location: lines.locate(pos) });
    }

    const location = lines.locate(start);
    const token = classifyTag(body, triple, location);
    if (!token) {
      tokens.push({ type: 'Text', content: match[0], location });
      pos = end;
      continue;
    }

    const span = isStructuralToken(token) ? findStandaloneSpan(text, start, end) : undefined;
    if (span) {
      const previous = tokens[tokens.length - 1];
      if (emittedText && previous.type === 'Text') {
        previous.content = cutToLastNewline(previous.content);
        if (previous.content === '') {
          tokens.pop();
        }
      }
      tokens.push(token);
      pos = span.end;
      pattern.lastIndex = span.end;
      continue;
    }

    tokens.push(token);
    pos = end;
  }

  if (pos < text.length) {
    tokens.push({ type: 'Text', content: text.slice(pos), location: lines.locate(pos) });
  }

  return tokens;
}
