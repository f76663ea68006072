/**
 * Flat token stream produced by the tag scanner.
 */
import type { SourceLocation } from './location';

export type TokenType =
  | 'Text'
  | 'Variable'
  | 'Comment'
  | 'Partial'
  | 'SectionOpen'
  | 'InvertedOpen'
  | 'SectionClose';

interface BaseToken {
  type: TokenType;
  location: SourceLocation;
}

export interface TextToken extends BaseToken {
  type: 'Text';
  content: string;
}

export interface VariableToken extends BaseToken {
  type: 'Variable';
  path: string;
  escaped: boolean;
}

export interface CommentToken extends BaseToken {
  type: 'Comment';
}

export interface PartialToken extends BaseToken {
  type: 'Partial';
  name: string;
}

export interface SectionOpenToken extends BaseToken {
  type: 'SectionOpen';
  name: string;
}

export interface InvertedOpenToken extends BaseToken {
  type: 'InvertedOpen';
  name: string;
}

export interface SectionCloseToken extends BaseToken {
  type: 'SectionClose';
  name: string;
}

export type Token =
  | TextToken
  | VariableToken
  | CommentToken
  | PartialToken
  | SectionOpenToken
  | InvertedOpenToken
  | SectionCloseToken;

/** Tokens that may sit alone on a line and take the whole line with them */
export type StructuralToken =
  | CommentToken
  | PartialToken
  | SectionOpenToken
  | InvertedOpenToken
  | SectionCloseToken;

export function isStructuralToken(token: Token): token is StructuralToken {
  return token.type !== 'Text' && token.type !== 'Variable';
}
