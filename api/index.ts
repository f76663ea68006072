/**
 * stache API Entry Point
 *
 * Parse and render Mustache-style templates programmatically.
 */
export { render, Renderer } from '@interpreter/core/renderer';
export type { RenderOptions } from '@interpreter/core/renderer';
export { ContextStack } from '@interpreter/env/ContextStack';
export { resolvePath } from '@interpreter/utils/context-resolver';
export { escapeHtml } from '@interpreter/utils/html-escape';
export { parseTemplate, scanTemplate, buildTree } from '@core/parser';
export { DEFAULT_PARTIAL_EXTENSION } from '@services/partials/PartialLoader';
export { NodeFileSystem } from '@services/fs/NodeFileSystem';
export type { IFileSystem } from '@services/fs/IFileSystem';
export { extractResume } from '@services/extraction/resume-markdown';
export type { ResumeData } from '@services/extraction/types';
export { ConfigLoader } from '@core/config/loader';
export type { StacheConfig } from '@core/config/types';
export * from '@core/errors';
export type {
  StructuredValue,
  StructuredMapping,
  Token,
  TemplateNode,
  SectionNode,
  SourceLocation
} from '@core/types';
