import chalk from 'chalk';
import { StacheError } from '@core/errors/StacheError';
import { formatLocationForError } from '@core/utils/locationFormatter';
import { cliLogger as logger } from '@core/utils/logger';

export interface ErrorHandlerOptions {
  debug?: boolean;
  /** Where formatted errors go (default: console.error) */
  write?: (text: string) => void;
}

/**
 * Prints errors for the CLI and decides the process exit code.
 */
export class ErrorHandler {
  private readonly debug: boolean;
  private readonly write: (text: string) => void;

  constructor(options: ErrorHandlerOptions = {}) {
    this.debug = options.debug ?? false;
    this.write = options.write ?? (text => console.error(text));
  }

  /**
   * Report `error` and return the exit code to use.
   */
  handleError(error: unknown): number {
    if (error instanceof StacheError) {
      this.handleStacheError(error);
      return 1;
    }
    if (error instanceof Error) {
      this.handleGenericError(error);
      return 1;
    }
    this.handleUnknownError(error);
    return 1;
  }

  private handleStacheError(error: StacheError): void {
    logger.debug('Render failed', error.toJSON());

    let text = chalk.red(`Error [${error.code}]: `) + error.message;
    if (error.sourceLocation) {
      text += chalk.gray(` (${formatLocationForError(error.sourceLocation)})`);
    }
    this.write(text);

    const cause = error.cause;
    if (cause instanceof Error) {
      this.write(chalk.red(`  Cause: ${cause.message}`));
    }
  }

  private handleGenericError(error: Error): void {
    logger.error('An unexpected error occurred', { message: error.message });
    this.write(chalk.red('Error: ') + error.message);

    if (this.debug && error.stack) {
      this.write(chalk.gray(error.stack));
    }
  }

  private handleUnknownError(error: unknown): void {
    logger.error('An unknown error occurred', { error: String(error) });
    this.write(chalk.red(`Unknown Error: ${String(error)}`));
  }
}
