import * as path from 'path';
import * as os from 'os';
import type { IFileSystem } from '@services/fs/IFileSystem';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { ConfigError } from '@core/errors/ConfigError';
import { configLogger as logger } from '@core/utils/logger';
import type { ResolvedOutputConfig, StacheConfig } from './types';

export const PROJECT_CONFIG_FILE = 'stache.config.json';

export interface ConfigLoaderOptions {
  /** Directory holding stache.config.json (default: cwd) */
  projectPath?: string;
  /** Home directory holding .config/stache.json (default: os.homedir()) */
  homeDir?: string;
  fileSystem?: IFileSystem;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load stache configuration from both global and project locations
 */
export class ConfigLoader {
  private readonly globalConfigPath: string;
  private readonly projectConfigPath: string;
  private readonly fileSystem: IFileSystem;
  private cachedConfig?: StacheConfig;

  constructor(options: ConfigLoaderOptions = {}) {
    const projectPath = options.projectPath ?? process.cwd();
    this.globalConfigPath = path.join(options.homeDir ?? os.homedir(), '.config', 'stache.json');
    this.projectConfigPath = path.join(projectPath, PROJECT_CONFIG_FILE);
    this.fileSystem = options.fileSystem ?? new NodeFileSystem();
  }

  /**
   * Load and merge configurations (project overrides global)
   */
  load(): StacheConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    this.cachedConfig = this.mergeConfigs(globalConfig, projectConfig);
    return this.cachedConfig;
  }

  resolveOutputConfig(): ResolvedOutputConfig {
    const output = this.load().output;
    return {
      normalizeBlankLines: output?.normalizeBlankLines ?? false,
      trailingNewline: output?.trailingNewline ?? false
    };
  }

  /**
   * A missing file is an empty config; unreadable JSON is an error.
   */
  private loadConfigFile(filePath: string): StacheConfig {
    if (!this.fileSystem.exists(filePath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(this.fileSystem.readFile(filePath));
    } catch (error) {
      throw new ConfigError(`Failed to parse config file ${filePath}`, {
        details: { filePath },
        cause: error
      });
    }

    logger.debug('Loaded config file', { filePath });
    return this.validateConfig(raw, filePath);
  }

  private validateConfig(raw: unknown, filePath: string): StacheConfig {
    if (!isObject(raw)) {
      throw new ConfigError(`Config file ${filePath} must contain a JSON object`, {
        details: { filePath }
      });
    }

    const config: StacheConfig = {};

    if (raw.partials !== undefined) {
      const partials = this.expectObject(raw.partials, 'partials', filePath);
      config.partials = {};
      if (partials.extension !== undefined) {
        config.partials.extension = this.expectString(partials.extension, 'partials.extension', filePath);
      }
      if (partials.baseDir !== undefined) {
        const baseDir = this.expectString(partials.baseDir, 'partials.baseDir', filePath);
        config.partials.baseDir = path.resolve(path.dirname(filePath), baseDir);
      }
    }

    if (raw.output !== undefined) {
      const output = this.expectObject(raw.output, 'output', filePath);
      config.output = {};
      if (output.normalizeBlankLines !== undefined) {
        config.output.normalizeBlankLines = this.expectBoolean(output.normalizeBlankLines, 'output.normalizeBlankLines', filePath);
      }
      if (output.trailingNewline !== undefined) {
        config.output.trailingNewline = this.expectBoolean(output.trailingNewline, 'output.trailingNewline', filePath);
      }
    }

    return config;
  }

  private expectObject(value: unknown, setting: string, filePath: string): JsonObject {
    if (!isObject(value)) {
      throw new ConfigError(`"${setting}" must be an object`, { details: { setting, filePath } });
    }
    return value;
  }

  private expectString(value: unknown, setting: string, filePath: string): string {
    if (typeof value !== 'string') {
      throw new ConfigError(`"${setting}" must be a string`, { details: { setting, filePath } });
    }
    return value;
  }

  private expectBoolean(value: unknown, setting: string, filePath: string): boolean {
    if (typeof value !== 'boolean') {
      throw new ConfigError(`"${setting}" must be a boolean`, { details: { setting, filePath } });
    }
    return value;
  }

  private mergeConfigs(global: StacheConfig, project: StacheConfig): StacheConfig {
    const merged: StacheConfig = {};

    // Validated configs never hold undefined values, so a spread merges key by key
    if (global.partials || project.partials) {
      merged.partials = { ...global.partials, ...project.partials };
    }

    if (global.output || project.output) {
      merged.output = { ...global.output, ...project.output };
    }

    return merged;
  }
}
