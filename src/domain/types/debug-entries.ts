/**
 * Domain types for debug entries
 * One entry per parsed input, collected by the parser and written by the
 * presentation layer
 */

export interface DebugTokenEntry {
  text: string;
  kinds: string[];
  start: number;
  end: number;
}

export interface DebugParseEntry {
  input: string;
  tokens: DebugTokenEntry[];
  /** Indented rendering of the parse tree */
  tree: string;
  /** Text no rule accepted */
  unknown: string[];
  /** Semantic values before rendering */
  values: string[];
  /** JSON of the rendered output */
  results?: string;
  error?: string;
}
