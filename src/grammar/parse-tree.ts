export type TokenKind =
  | 'INT'
  | 'PUNCT'
  | 'MONTHNAME'
  | 'WEEKDAY'
  | 'MERIDIEM'
  | 'DATENAME'
  | 'DATETIMENAME'
  | 'DAYRANGE'
  | 'TIMENAME'
  | 'UNIT'
  | 'NUMWORD'
  | 'ORDINAL'
  | 'DAYSUFFIX'
  | 'MODIFIER'
  | 'KEYWORD'
  | 'TIMEZONE'
  | 'WORD'
  | 'SYMBOL';

export interface Token {
  /** Every terminal that matched this exact span, highest priority first */
  readonly kinds: readonly TokenKind[];
  readonly text: string;
  /** Lower-cased text */
  readonly value: string;
  readonly start: number;
  readonly end: number;
}

export type RuleName =
  | 'start'
  | 'unknown'
  | 'expression'
  | 'range'
  | 'list'
  | 'single'
  | 'relative'
  | 'ambiguous'
  | 'datetime'
  | 'date'
  | 'weekday'
  | 'nthweekday'
  | 'dayrange'
  | 'datename'
  | 'datetimename'
  | 'monthname'
  | 'month'
  | 'day'
  | 'year'
  | 'dayoryear'
  | 'time'
  | 'hour'
  | 'minute'
  | 'second'
  | 'millisecond'
  | 'meridiem'
  | 'timezone'
  | 'timename'
  | 'duration'
  | 'durationpart';

/** One-token rules, produced by capturing a terminal */
export type LeafRule = 'month' | 'day' | 'year' | 'dayoryear' | 'hour' | 'minute' | 'second' | 'millisecond' | 'meridiem' | 'timezone';

/** Rules defined in the rule table; `start` and `unknown` are built by the scanner */
export type GrammarRule = Exclude<RuleName, 'start' | 'unknown' | LeafRule>;

export interface ParseNode {
  readonly rule: RuleName;
  readonly children: readonly ParseChild[];
  /** Character offsets into the source text */
  readonly start: number;
  readonly end: number;
}

export type ParseChild = ParseNode | Token;

export function isParseNode(child: ParseChild): child is ParseNode {
  return 'rule' in child;
}

export function hasKind(token: Token, kind: TokenKind): boolean {
  return token.kinds.includes(kind);
}

/** Indented one-line-per-node rendering, for verbose logs. */
export function formatTree(node: ParseNode, indent = ''): string {
  const lines = [`${indent}${node.rule} [${node.start}, ${node.end})`];
  for (const child of node.children) {
    if (isParseNode(child)) {
      lines.push(formatTree(child, `${indent}  `));
    } else {
      lines.push(`${indent}  ${child.kinds[0]} ${JSON.stringify(child.text)}`);
    }
  }
  return lines.join('\n');
}
