import { describe, it, expect } from 'vitest';
import { buildTree } from './tree-builder';
import { scanTemplate } from './scanner';
import { parseTemplate } from './index';
import { StructureError } from '@core/errors/StructureError';
import type { TemplateNode } from '@core/types/nodes';

function stripLocations(nodes: TemplateNode[]): unknown[] {
  return nodes.map(node => {
    const { location: _location, ...rest } = node;
    if (node.type === 'Section') {
      return { ...rest, children: stripLocations(node.children) };
    }
    return rest;
  });
}

function captureError(template: string): StructureError {
  try {
    parseTemplate(template);
  } catch (error) {
    if (error instanceof StructureError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected parseTemplate to throw');
}

describe('buildTree', () => {
  it('nests section content in source order', () => {
    const tree = buildTree(scanTemplate('a{{#outer}}b{{^inner}}c{{/inner}}d{{/outer}}e'));
    expect(stripLocations(tree)).toEqual([
      { type: 'Text', content: 'a' },
      {
        type: 'Section',
        name: 'outer',
        inverted: false,
        children: [
          { type: 'Text', content: 'b' },
          {
            type: 'Section',
            name: 'inner',
            inverted: true,
            children: [{ type: 'Text', content: 'c' }]
          },
          { type: 'Text', content: 'd' }
        ]
      },
      { type: 'Text', content: 'e' }
    ]);
  });

  it('drops comments', () => {
    const tree = buildTree(scanTemplate('x{{! hidden }}y'));
    expect(stripLocations(tree)).toEqual([
      { type: 'Text', content: 'x' },
      { type: 'Text', content: 'y' }
    ]);
  });

  it('keeps variables and partials as leaves', () => {
    const tree = buildTree(scanTemplate('{{{raw}}}{{> part}}'));
    expect(stripLocations(tree)).toEqual([
      { type: 'Variable', name: 'raw', escaped: false },
      { type: 'Partial', name: 'part' }
    ]);
  });

  it('allows sibling sections with the same name', () => {
    const tree = buildTree(scanTemplate('{{#a}}1{{/a}}{{#a}}2{{/a}}'));
    expect(tree).toHaveLength(2);
  });
});

describe('structure errors', () => {
  it('rejects a close tag naming a different section', () => {
    const error = captureError('{{#a}}{{/b}}');
    expect(error.message).toBe('Unmatched section end: b (expected /a)');
    expect(error.code).toBe('E_TEMPLATE_STRUCTURE');
    expect(error.details).toEqual({ sections: ['a'], expected: 'a' });
    expect(error.sourceLocation).toEqual({ offset: 6, line: 1, column: 7 });
  });

  it('rejects a close tag with nothing open', () => {
    const error = captureError('text {{/a}}');
    expect(error.message).toBe('Unmatched section end: a');
  });

  it('rejects unclosed sections', () => {
    expect(captureError('{{#a}}{{#b}}{{/b}}').message).toBe('Unclosed section(s): a');
    expect(captureError('{{#a}}\n{{^b}}\n').message).toBe('Unclosed section(s): a, b');
  });

  it('requires closes in reverse order of opening', () => {
    expect(captureError('{{#a}}{{#b}}{{/a}}{{/b}}').message).toBe('Unmatched section end: a (expected /b)');
  });

  it('is a StructureError', () => {
    expect(() => parseTemplate('{{#a}}')).toThrow(StructureError);
  });
});
