import * as path from 'path';
import type { IFileSystem } from '@services/fs/IFileSystem';
import type { SourceLocation } from '@core/types/location';
import { ConfigError } from '@core/errors/ConfigError';
import { NotFoundError } from '@core/errors/NotFoundError';
import { partialsLogger as logger } from '@core/utils/logger';

export const DEFAULT_PARTIAL_EXTENSION = '.mustache.html';

export interface LoadedPartial {
  /** File the partial was read from */
  path: string;
  content: string;
}

export interface PartialLoaderOptions {
  baseDir?: string;
  extension?: string;
  fileSystem: IFileSystem;
}

/**
 * Finds and reads partial templates. `{{> name}}` is looked up as
 * `<baseDir>/name<extension>` first and then as `<baseDir>/name`, so
 * templates may name partials either way. Nothing is cached.
 */
export class PartialLoader {
  private readonly baseDir?: string;
  private readonly extension: string;
  private readonly fileSystem: IFileSystem;

  constructor(options: PartialLoaderOptions) {
    this.baseDir = options.baseDir;
    this.extension = options.extension ?? DEFAULT_PARTIAL_EXTENSION;
    this.fileSystem = options.fileSystem;
  }

  /**
   * Candidate paths for `name`, in lookup order.
   */
  candidates(name: string): string[] {
    if (this.baseDir === undefined) {
      return [];
    }
    return [
      path.join(this.baseDir, `${name}${this.extension}`),
      path.join(this.baseDir, name)
    ];
  }

  load(name: string, location?: SourceLocation): LoadedPartial {
    if (this.baseDir === undefined) {
      throw new ConfigError(`Partial "${name}" requires a partial base directory`, {
        details: { setting: 'partialBaseDir' }
      });
    }

    const searched = this.candidates(name);
    for (const candidate of searched) {
      if (this.fileSystem.isFile(candidate)) {
        logger.debug('Loading partial', { name, path: candidate });
        return { path: candidate, content: this.fileSystem.readFile(candidate) };
      }
    }

    throw new NotFoundError(`Partial not found: ${name}`, {
      details: { searched, operation: 'partial' },
      sourceLocation: location
    });
  }
}
