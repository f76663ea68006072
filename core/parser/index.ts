import type { TemplateNode } from '@core/types/nodes';
import { parserLogger as logger } from '@core/utils/logger';
import { scanTemplate, type ScanOptions } from './scanner';
import { buildTree } from './tree-builder';

export { scanTemplate, classifyTag } from './scanner';
export type { ScanOptions } from './scanner';
export { buildTree } from './tree-builder';
export { findStandaloneSpan, findLineBounds, cutToLastNewline } from './standalone';

/**
 * Parse template text into its AST. Throws StructureError for badly nested
 * sections.
 */
export function parseTemplate(text: string, options: ScanOptions = {}): TemplateNode[] {
  const tokens = scanTemplate(text, options);
  logger.debug('Scanned template', { filePath: options.filePath, tokens: tokens.length });
  return buildTree(tokens);
}
