import { describe, it, expect, afterEach } from 'vitest';
import fsExtra from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import {
  render,
  parseTemplate,
  extractResume,
  StructureError,
  NotFoundError,
  StacheError,
  DEFAULT_PARTIAL_EXTENSION
} from './index';

describe('public API', () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fsExtra.removeSync(dir);
    }
  });

  it('renders with escaping in one call', () => {
    expect(render('Hello {{name}}!', { name: '<World>' })).toBe('Hello &lt;World&gt;!');
  });

  it('exposes the parsed tree', () => {
    expect(parseTemplate('{{#items}}{{.}}{{/items}}')).toMatchObject([
      {
        type: 'Section',
        name: 'items',
        inverted: false,
        children: [{ type: 'Variable', name: '.', escaped: true }]
      }
    ]);
  });

  it('throws typed errors', () => {
    expect(() => render('{{/items}}', {})).toThrow(StructureError);
    expect(() => render('{{/items}}', {})).toThrow(StacheError);
  });

  it('reads partials from disk by default', () => {
    const dir = fsExtra.mkdtempSync(path.join(os.tmpdir(), 'stache-api-'));
    tempDirs.push(dir);
    fsExtra.outputFileSync(path.join(dir, `row${DEFAULT_PARTIAL_EXTENSION}`), '<li>{{.}}</li>');

    expect(render('<ul>{{#items}}{{> row}}{{/items}}</ul>', { items: ['a', 'b'] }, { partialBaseDir: dir })).toBe(
      '<ul><li>a</li><li>b</li></ul>'
    );
    expect(() => render('{{> missing}}', {}, { partialBaseDir: dir })).toThrow(NotFoundError);
  });

  it('accepts the partial directory as a plain path', () => {
    const dir = fsExtra.mkdtempSync(path.join(os.tmpdir(), 'stache-api-'));
    tempDirs.push(dir);
    fsExtra.outputFileSync(path.join(dir, 'p.mustache.html'), 'P');

    expect(render('{{> p}}', {}, dir)).toBe('P');
  });

  it('reports a partial under a base path that is a file as not found', () => {
    const dir = fsExtra.mkdtempSync(path.join(os.tmpdir(), 'stache-api-'));
    tempDirs.push(dir);
    const resumePath = path.join(dir, 'resume.md');
    fsExtra.outputFileSync(resumePath, '# Name');

    expect(() => render('{{> header}}', {}, resumePath)).toThrow(NotFoundError);
    expect(() => render('{{> header}}', {}, { partialBaseDir: resumePath })).toThrow(NotFoundError);
  });

  it('feeds extracted resume data into templates', () => {
    const data = extractResume('# Ada Lovelace\n\n## Keywords\nengines, notes\n');
    expect(render('{{person.last_name}}: {{keywords}}', data)).toBe('Lovelace: engines, notes');
  });
});
