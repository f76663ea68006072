/**
 * AST produced by the tree builder and consumed by the renderer.
 */
import type { SourceLocation } from './location';

export type NodeType = 'Text' | 'Variable' | 'Partial' | 'Comment' | 'Section';

export interface BaseTemplateNode {
  type: NodeType;
  location?: SourceLocation;
}

export interface TextNode extends BaseTemplateNode {
  type: 'Text';
  content: string;
}

export interface VariableNode extends BaseTemplateNode {
  type: 'Variable';
  name: string;
  escaped: boolean;
}

export interface PartialNode extends BaseTemplateNode {
  type: 'Partial';
  name: string;
}

// Never produced by the tree builder; renders as nothing if constructed by hand.
export interface CommentNode extends BaseTemplateNode {
  type: 'Comment';
}

export interface SectionNode extends BaseTemplateNode {
  type: 'Section';
  name: string;
  inverted: boolean;
  children: TemplateNode[];
}

export type TemplateNode = TextNode | VariableNode | PartialNode | CommentNode | SectionNode;
