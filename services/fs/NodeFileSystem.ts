import fsExtra from 'fs-extra';
import type { IFileSystem } from '@services/fs/IFileSystem';
import { filesystemLogger as logger } from '@core/utils/logger';

/**
 * Adapter to use Node's fs-extra as our IFileSystem implementation
 */
export class NodeFileSystem implements IFileSystem {
  readFile(path: string): string {
    return fsExtra.readFileSync(path, 'utf-8');
  }

  // Creates missing parent directories
  writeFile(path: string, content: string): void {
    fsExtra.outputFileSync(path, content, 'utf-8');
    logger.debug('Wrote file', { path, length: content.length });
  }

  exists(path: string): boolean {
    return fsExtra.pathExistsSync(path);
  }

  // A missing path, or one running through a regular file, is not a file
  isFile(path: string): boolean {
    try {
      return fsExtra.statSync(path).isFile();
    } catch (error) {
      if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return false;
      }
      throw error;
    }
  }

  mkdir(path: string): void {
    fsExtra.ensureDirSync(path);
  }
}
