/**
 * Synchronous file access used by partial loading, config loading and the
 * CLI. Rendering never suspends, so neither does this interface.
 */
interface IFileSystem {
  // File operations
  readFile(path: string): string;
  writeFile(path: string, content: string): void;
  exists(path: string): boolean;
  isFile(path: string): boolean;

  // Directory operations
  mkdir(path: string): void;
}

export type { IFileSystem };
