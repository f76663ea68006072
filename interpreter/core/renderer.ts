/**
 * Template renderer: evaluates a parsed template against a context stack.
 */
import type { PartialNode, SectionNode, TemplateNode, VariableNode } from '@core/types/nodes';
import { isMapping, isSequence, isTruthy, type StructuredValue } from '@core/types/values';
import { parseTemplate } from '@core/parser';
import { ContextStack } from '@interpreter/env/ContextStack';
import { resolvePath } from '@interpreter/utils/context-resolver';
import { escapeHtml } from '@interpreter/utils/html-escape';
import { stringifyValue } from '@interpreter/utils/stringify';
import type { IFileSystem } from '@services/fs/IFileSystem';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { PartialLoader } from '@services/partials/PartialLoader';
import { rendererLogger as logger } from '@core/utils/logger';

export interface RenderOptions {
  /** Directory partials are looked up in. Partials fail without it. */
  partialBaseDir?: string;
  /** Suffix tried before the bare partial name (default `.mustache.html`) */
  partialExtension?: string;
  /** File access for partials; defaults to the real file system */
  fileSystem?: IFileSystem;
}

export class Renderer {
  private readonly partials: PartialLoader;

  constructor(options: RenderOptions = {}) {
    this.partials = new PartialLoader({
      baseDir: options.partialBaseDir,
      extension: options.partialExtension,
      fileSystem: options.fileSystem ?? new NodeFileSystem()
    });
  }

  /**
   * Parse and render `template` against `context`.
   */
  render(template: string, context: StructuredValue): string {
    const nodes = parseTemplate(template);
    return this.renderNodes(nodes, ContextStack.root(context));
  }

  renderNodes(nodes: TemplateNode[], stack: ContextStack): string {
    let output = '';
    for (const node of nodes) {
      output += this.renderNode(node, stack);
    }
    return output;
  }

  private renderNode(node: TemplateNode, stack: ContextStack): string {
    switch (node.type) {
      case 'Text':
        return node.content;
      case 'Variable':
        return this.renderVariable(node, stack);
      case 'Comment':
        return '';
      case 'Partial':
        return this.renderPartial(node, stack);
      case 'Section':
        return this.renderSection(node, stack);
    }
  }

  private renderVariable(node: VariableNode, stack: ContextStack): string {
    const text = stringifyValue(resolvePath(stack, node.name));
    return node.escaped ? escapeHtml(text) : text;
  }

  // Partials see the caller's whole scope chain.
  private renderPartial(node: PartialNode, stack: ContextStack): string {
    const partial = this.partials.load(node.name, node.location);
    const nodes = parseTemplate(partial.content, { filePath: partial.path });
    return this.renderNodes(nodes, stack);
  }

  private renderSection(node: SectionNode, stack: ContextStack): string {
    const value = resolvePath(stack, node.name);

    if (node.inverted) {
      return isTruthy(value) ? '' : this.renderNodes(node.children, stack);
    }

    // Empty mappings are falsy too, keeping `#` and `^` complementary
    if (!isTruthy(value)) {
      return '';
    }

    if (isSequence(value)) {
      logger.debug('Rendering list section', { name: node.name, items: value.length });
      let output = '';
      for (const item of value) {
        output += this.renderNodes(node.children, stack.push(item));
      }
      return output;
    }

    if (isMapping(value)) {
      return this.renderNodes(node.children, stack.push(value));
    }

    // Flag sections: no new scope
    return this.renderNodes(node.children, stack);
  }
}

/**
 * Render `template` against `context` in one call. The third argument is
 * either the partial base directory or full render options.
 */
export function render(
  template: string,
  context: StructuredValue,
  partialBaseDir: string | RenderOptions = {}
): string {
  const options = typeof partialBaseDir === 'string' ? { partialBaseDir } : partialBaseDir;
  return new Renderer(options).render(template, context);
}
