/**
 * Configuration types for stache
 */

export interface StacheConfig {
  partials?: PartialsConfig;
  output?: OutputConfig;
}

export interface PartialsConfig {
  /** Suffix tried before the bare partial name, e.g. ".mustache.html" */
  extension?: string;
  /** Partial directory; relative paths resolve against the config file */
  baseDir?: string;
}

export interface OutputConfig {
  /** Collapse runs of blank lines to a single blank line */
  normalizeBlankLines?: boolean;
  /** End non-empty output with exactly one newline */
  trailingNewline?: boolean;
}

// Runtime configuration after merging and applying defaults
export interface ResolvedOutputConfig {
  normalizeBlankLines: boolean;
  trailingNewline: boolean;
}
