import { describe, it, expect } from 'vitest';
import { ConfigLoader, PROJECT_CONFIG_FILE } from './loader';
import { MemfsTestFileSystem } from '@tests/utils/MemfsTestFileSystem';
import { ConfigError } from '@core/errors/ConfigError';

const GLOBAL_PATH = '/home/user/.config/stache.json';
const PROJECT_PATH = `/project/${PROJECT_CONFIG_FILE}`;

function loaderFor(files: Record<string, string>): ConfigLoader {
  return new ConfigLoader({
    projectPath: '/project',
    homeDir: '/home/user',
    fileSystem: new MemfsTestFileSystem(files)
  });
}

describe('ConfigLoader', () => {
  it('returns an empty config when no files exist', () => {
    const loader = loaderFor({});
    expect(loader.load()).toEqual({});
    expect(loader.resolveOutputConfig()).toEqual({ normalizeBlankLines: false, trailingNewline: false });
  });

  it('resolves partial directories against the config file location', () => {
    const loader = loaderFor({
      [PROJECT_PATH]: JSON.stringify({ partials: { baseDir: 'templates', extension: '.html' } })
    });
    expect(loader.load()).toEqual({
      partials: { baseDir: '/project/templates', extension: '.html' }
    });
  });

  it('lets project settings override global ones key by key', () => {
    const loader = loaderFor({
      [GLOBAL_PATH]: JSON.stringify({
        partials: { baseDir: 'partials', extension: '.tpl' },
        output: { normalizeBlankLines: true, trailingNewline: true }
      }),
      [PROJECT_PATH]: JSON.stringify({
        partials: { extension: '.html' },
        output: { trailingNewline: false }
      })
    });

    expect(loader.load()).toEqual({
      partials: { baseDir: '/home/user/.config/partials', extension: '.html' },
      output: { normalizeBlankLines: true, trailingNewline: false }
    });
    expect(loader.resolveOutputConfig()).toEqual({ normalizeBlankLines: true, trailingNewline: false });
  });

  it('caches the merged config', () => {
    const loader = loaderFor({ [PROJECT_PATH]: '{"output":{"trailingNewline":true}}' });
    expect(loader.load()).toBe(loader.load());
  });

  it('rejects malformed JSON', () => {
    expect.assertions(5);
    const loader = loaderFor({ [PROJECT_PATH]: '{ not json' });
    expect(() => loader.load()).toThrow(`Failed to parse config file ${PROJECT_PATH}`);

    try {
      loaderFor({ [PROJECT_PATH]: '{ not json' }).load();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe('E_CONFIG');
        expect(error.details).toEqual({ filePath: PROJECT_PATH });
        expect(error.cause).toBeInstanceOf(SyntaxError);
      }
    }
  });

  it('rejects a config that is not an object', () => {
    const loader = loaderFor({ [GLOBAL_PATH]: '[1, 2]' });
    expect(() => loader.load()).toThrow(`Config file ${GLOBAL_PATH} must contain a JSON object`);
  });

  it.each([
    ['{"partials": "templates"}', '"partials" must be an object'],
    ['{"partials": {"baseDir": 3}}', '"partials.baseDir" must be a string'],
    ['{"partials": {"extension": false}}', '"partials.extension" must be a string'],
    ['{"output": {"trailingNewline": "yes"}}', '"output.trailingNewline" must be a boolean'],
    ['{"output": {"normalizeBlankLines": 1}}', '"output.normalizeBlankLines" must be a boolean']
  ])('rejects %s', (content, message) => {
    const loader = loaderFor({ [PROJECT_PATH]: content });
    expect(() => loader.load()).toThrow(message);
  });

  it('ignores unknown keys', () => {
    const loader = loaderFor({ [PROJECT_PATH]: '{"theme": "dark"}' });
    expect(loader.load()).toEqual({});
  });
});
