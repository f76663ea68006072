import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import chalk from 'chalk';
import { ErrorHandler } from './ErrorHandler';
import { StacheError, ErrorSeverity } from '@core/errors/StacheError';
import { NotFoundError } from '@core/errors/NotFoundError';

describe('ErrorHandler', () => {
  let previousLevel: typeof chalk.level;

  beforeAll(() => {
    previousLevel = chalk.level;
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = previousLevel;
  });

  function collect(debug = false) {
    const lines: string[] = [];
    const handler = new ErrorHandler({ debug, write: text => lines.push(text) });
    return { lines, handler };
  }

  it('prints fatal stache errors with location and fails', () => {
    const { lines, handler } = collect();
    const error = new NotFoundError('Partial not found: nav', {
      details: { searched: ['/t/nav'] },
      sourceLocation: { offset: 0, line: 3, column: 5, filePath: 'page.html' }
    });

    expect(handler.handleError(error)).toBe(1);
    expect(lines).toEqual(['Error [E_NOT_FOUND]: Partial not found: nav (page.html:3:5)']);
  });

  it('prints the cause of a stache error', () => {
    const { lines, handler } = collect();
    const error = new StacheError('Bad data', {
      code: 'E_CONFIG',
      severity: ErrorSeverity.Fatal,
      cause: new Error('Unexpected end of JSON input')
    });

    expect(handler.handleError(error)).toBe(1);
    expect(lines).toEqual(['Error [E_CONFIG]: Bad data', '  Cause: Unexpected end of JSON input']);
  });

  it('prints the stack of unexpected errors only in debug mode', () => {
    const error = new Error('boom');

    const quiet = collect();
    expect(quiet.handler.handleError(error)).toBe(1);
    expect(quiet.lines).toEqual(['Error: boom']);

    const verbose = collect(true);
    verbose.handler.handleError(error);
    expect(verbose.lines).toEqual(['Error: boom', error.stack]);
  });

  it('handles thrown non-errors', () => {
    const { lines, handler } = collect();
    expect(handler.handleError('oops')).toBe(1);
    expect(lines).toEqual(['Unknown Error: oops']);
  });
});
