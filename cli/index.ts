import { Command, CommanderError } from 'commander';
import { version } from '@core/version';
import { loggerFactory } from '@core/utils/logger';
import type { IFileSystem } from '@services/fs/IFileSystem';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { ErrorHandler } from './error/ErrorHandler';
import { runRender, type RenderCommandOptions } from './commands/render';

export interface CLIOptions extends RenderCommandOptions {
  verbose?: boolean;
  debug?: boolean;
}

export interface CLIDependencies {
  fileSystem?: IFileSystem;
  cwd?: string;
  homeDir?: string;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

export function createProgram(run: (options: CLIOptions) => void): Command {
  const program = new Command();

  program
    .name('stache')
    .description('Render Mustache-style HTML templates from resume Markdown')
    .version(version)
    .option('-c, --content <file>', 'Markdown content file', 'resume.md')
    .option('-t, --template <file>', 'Mustache HTML template', 'templates/resume_base.mustache.html')
    .option('-o, --output <file>', 'Rendered HTML output', 'resume_generated.html')
    .option('--data-out <file>', 'Also write the extracted data as JSON')
    .option('--data <file>', 'Render a JSON data file instead of extracting Markdown')
    .option('--partials <dir>', 'Directory partials are loaded from')
    .option('-v, --verbose', 'Log progress')
    .option('-d, --debug', 'Log debug details and stack traces')
    .action((options: CLIOptions) => run(options));

  return program;
}

/**
 * Run the CLI with `args` (without the node/script prefix). Returns the
 * exit code instead of exiting.
 */
export function main(args: string[], deps: CLIDependencies = {}): number {
  const stdout = deps.stdout ?? (text => console.log(text));
  const stderr = deps.stderr ?? (text => console.error(text));
  let debug = false;

  const program = createProgram(options => {
    debug = options.debug ?? false;
    if (options.debug) {
      loggerFactory.setLevel('debug');
    } else if (options.verbose) {
      loggerFactory.setLevel('info');
    }

    const summary = runRender(options, {
      fileSystem: deps.fileSystem ?? new NodeFileSystem(),
      cwd: deps.cwd ?? process.cwd(),
      homeDir: deps.homeDir
    });

    if (summary.dataOutPath) {
      stdout(`Wrote data: ${summary.dataOutPath}`);
    }
    stdout(`Wrote: ${summary.outputPath}`);
  });

  program.exitOverride();
  program.configureOutput({ writeOut: stdout, writeErr: stderr });

  try {
    program.parse(args, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    return new ErrorHandler({ debug, write: stderr }).handleError(error);
  }
}
