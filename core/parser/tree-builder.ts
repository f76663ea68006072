/**
 * Nests the flat token stream into a template AST.
 */
import type { Token } from '@core/types/tokens';
import type { SectionNode, TemplateNode } from '@core/types/nodes';
import { StructureError } from '@core/errors/StructureError';

export function buildTree(tokens: Token[]): TemplateNode[] {
  const root: TemplateNode[] = [];
  const open: SectionNode[] = [];

  const append = (node: TemplateNode): void => {
    const parent = open[open.length - 1];
    (parent ? parent.children : root).push(node);
  };

  for (const token of tokens) {
    switch (token.type) {
      case 'Text':
        append({ type: 'Text', content: token.content, location: token.location });
        break;
      case 'Variable':
        append({ type: 'Variable', name: token.path, escaped: token.escaped, location: token.location });
        break;
      case 'Partial':
        append({ type: 'Partial', name: token.name, location: token.location });
        break;
      case 'Comment':
        break;
      case 'SectionOpen':
      case 'InvertedOpen': {
        const section: SectionNode = {
          type: 'Section',
          name: token.name,
          inverted: token.type === 'InvertedOpen',
          children: [],
          location: token.location
        };
        append(section);
        open.push(section);
        break;
      }
      case 'SectionClose': {
        const current = open.pop();
        if (!current) {
          throw new StructureError(`Unmatched section end: ${token.name}`, {
            details: { sections: [token.name] },
            sourceLocation: token.location
          });
        }
        if (current.name !== token.name) {
          throw new StructureError(
            `Unmatched section end: ${token.name} (expected /${current.name})`,
            {
              details: { sections: [...open.map(section => section.name), current.name], expected: current.name },
              sourceLocation: token.location
            }
          );
        }
        break;
      }
    }
  }

  if (open.length > 0) {
    const names = open.map(section => section.name);
    throw new StructureError(`Unclosed section(s): ${names.join(', ')}`, {
      details: { sections: names },
      sourceLocation: open[open.length - 1].location
    });
  }

  return root;
}
