import * as path from 'path';
import type { IFileSystem } from '@services/fs/IFileSystem';
import { extractResume } from '@services/extraction/resume-markdown';
import { Renderer } from '@interpreter/core/renderer';
import { normalizeOutput } from '@interpreter/utils/blank-line-normalizer';
import { ConfigLoader } from '@core/config/loader';
import { NotFoundError } from '@core/errors/NotFoundError';
import { ConfigError } from '@core/errors/ConfigError';
import { toStructuredValue, type StructuredValue } from '@core/types/values';
import { cliLogger as logger } from '@core/utils/logger';

export interface RenderCommandOptions {
  content: string;
  template: string;
  output: string;
  dataOut?: string;
  /** JSON file used as the root context instead of extracting `content` */
  data?: string;
  /** Partial directory; defaults to config, then the template's directory */
  partials?: string;
}

export interface RenderCommandContext {
  fileSystem: IFileSystem;
  /** Directory relative paths and stache.config.json are resolved against */
  cwd: string;
  homeDir?: string;
}

export interface RenderSummary {
  outputPath: string;
  dataOutPath?: string;
  bytes: number;
}

function readInput(fileSystem: IFileSystem, filePath: string, what: string): string {
  if (!fileSystem.isFile(filePath)) {
    throw new NotFoundError(`${what} file not found: ${filePath}`, {
      details: { searched: [filePath], operation: 'read' }
    });
  }
  return fileSystem.readFile(filePath);
}

function loadContext(options: RenderCommandOptions, context: RenderCommandContext): StructuredValue {
  const { fileSystem, cwd } = context;

  if (options.data) {
    const dataPath = path.resolve(cwd, options.data);
    let parsed: unknown;
    try {
      parsed = JSON.parse(readInput(fileSystem, dataPath, 'Data'));
    } catch (error) {
      if (error instanceof NotFoundError) throw error;
      throw new ConfigError(`Data file is not valid JSON: ${dataPath}`, {
        details: { filePath: dataPath },
        cause: error
      });
    }
    const value = toStructuredValue(parsed);
    if (value === undefined) {
      throw new ConfigError(`Data file holds values that cannot be rendered: ${dataPath}`, {
        details: { filePath: dataPath }
      });
    }
    return value;
  }

  const contentPath = path.resolve(cwd, options.content);
  return extractResume(readInput(fileSystem, contentPath, 'Content'));
}

/**
 * Extract (or load) the context, render the template and write the result.
 */
export function runRender(options: RenderCommandOptions, context: RenderCommandContext): RenderSummary {
  const { fileSystem, cwd } = context;
  const config = new ConfigLoader({ projectPath: cwd, homeDir: context.homeDir, fileSystem });
  const settings = config.load();

  const templatePath = path.resolve(cwd, options.template);
  const outputPath = path.resolve(cwd, options.output);
  const partialBaseDir = options.partials
    ? path.resolve(cwd, options.partials)
    : settings.partials?.baseDir ?? path.dirname(templatePath);

  const data = loadContext(options, context);
  const summary: RenderSummary = { outputPath, bytes: 0 };

  if (options.dataOut) {
    summary.dataOutPath = path.resolve(cwd, options.dataOut);
    fileSystem.writeFile(summary.dataOutPath, JSON.stringify(data, null, 2));
  }

  const renderer = new Renderer({
    partialBaseDir,
    partialExtension: settings.partials?.extension,
    fileSystem
  });
  const template = readInput(fileSystem, templatePath, 'Template');
  const html = normalizeOutput(renderer.render(template, data), config.resolveOutputConfig());

  fileSystem.writeFile(outputPath, html);
  summary.bytes = Buffer.byteLength(html, 'utf-8');
  logger.debug('Rendered template', { templatePath, partialBaseDir, bytes: summary.bytes });

  return summary;
}
