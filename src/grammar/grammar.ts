import { MonthTable, TimezoneTable } from '../data';
import { IMonthLookup, ITimezoneLookup } from '../domain/interfaces';

import { Capture, Expr, RuleTable } from './expressions';
import { Lexicon } from './lexicon';
import { GrammarRule, ParseChild, ParseNode, RuleName, Token } from './parse-tree';
import { RULES } from './rules';
import { tokenize } from './tokenizer';

interface Branch {
  children: ParseChild[];
  /** Index of the first token after the match */
  next: number;
}

interface Match {
  node: ParseNode;
  next: number;
}

/** Keeps the first branch reaching each end position. */
function uniqueByEnd(branches: Branch[]): Branch[] {
  const ends = new Set<number>();
  return branches.filter((branch) => {
    if (ends.has(branch.next)) return false;
    ends.add(branch.next);
    return true;
  });
}

/**
 * Backtracking matcher over one token list. Every rule returns all of its
 * matches at a position, at most one per end position (the first alternative
 * to reach it), memoized per rule and position.
 */
class RuleMatcher {
  private readonly memo = new Map<string, Match[]>();

  constructor(
    private readonly rules: RuleTable,
    private readonly tokens: readonly Token[],
    private readonly text: string
  ) {}

  parse(): ParseNode {
    const children: ParseNode[] = [];
    let unknownFrom: number | undefined;
    let position = 0;

    const flushUnknown = (end: number): void => {
      if (unknownFrom === undefined) return;
      children.push(this.createNode('unknown', this.tokens.slice(unknownFrom, end), unknownFrom, end));
      unknownFrom = undefined;
    };

    while (position < this.tokens.length) {
      const longest = this.longest(this.matchRule('expression', position));
      if (longest) {
        flushUnknown(position);
        children.push(longest.node);
        position = longest.next;
      } else {
        unknownFrom ??= position;
        position++;
      }
    }
    flushUnknown(position);

    return { rule: 'start', children, start: 0, end: this.text.length };
  }

  private longest(matches: readonly Match[]): Match | undefined {
    let best: Match | undefined;
    for (const match of matches) {
      if (!best || match.next > best.next) best = match;
    }
    return best;
  }

  private matchRule(rule: GrammarRule, position: number): Match[] {
    const key = `${rule}@${position}`;
    const cached = this.memo.get(key);
    if (cached) return cached;
    // Guards against runaway recursion; the rule table has no left recursion.
    this.memo.set(key, []);

    const matches: Match[] = [];
    const ends = new Set<number>();
    for (const branch of this.matchExpr(this.rules[rule], position)) {
      if (branch.next === position || ends.has(branch.next)) continue;
      ends.add(branch.next);
      matches.push({ node: this.createNode(rule, branch.children, position, branch.next), next: branch.next });
    }

    this.memo.set(key, matches);
    return matches;
  }

  private matchExpr(expr: Expr, position: number): Branch[] {
    switch (expr.type) {
      case 'terminal': {
        const token = this.tokens[position];
        if (!token || !expr.test(token)) return [];
        return [{ children: this.capture(expr.capture, token, position), next: position + 1 }];
      }
      case 'ref':
        return this.matchRule(expr.rule, position).map((match) => ({ children: [match.node], next: match.next }));
      case 'seq': {
        let branches: Branch[] = [{ children: [], next: position }];
        for (const item of expr.items) {
          const extended: Branch[] = [];
          for (const branch of branches) {
            for (const tail of this.matchExpr(item, branch.next)) {
              extended.push({ children: [...branch.children, ...tail.children], next: tail.next });
            }
          }
          branches = uniqueByEnd(extended);
          if (branches.length === 0) break;
        }
        return branches;
      }
      case 'alt':
        return expr.options.flatMap((option) => this.matchExpr(option, position));
      case 'opt':
        return [...this.matchExpr(expr.item, position), { children: [], next: position }];
      case 'many': {
        const results: Branch[] = [];
        let frontier: Branch[] = [{ children: [], next: position }];
        let count = 0;
        if (expr.min === 0) results.push(frontier[0]);
        while (frontier.length > 0) {
          const grown: Branch[] = [];
          for (const branch of frontier) {
            for (const tail of this.matchExpr(expr.item, branch.next)) {
              if (tail.next > branch.next) {
                grown.push({ children: [...branch.children, ...tail.children], next: tail.next });
              }
            }
          }
          count++;
          frontier = uniqueByEnd(grown);
          if (count >= expr.min) results.push(...frontier);
        }
        // longer repetitions first, like the other greedy operators
        return results.reverse();
      }
    }
  }

  private capture(capture: Capture | undefined, token: Token, position: number): ParseChild[] {
    if (capture === undefined) return [];
    if (capture === 'token') return [token];
    return [this.createNode(capture, [token], position, position + 1)];
  }

  private createNode(rule: RuleName, children: readonly ParseChild[], from: number, to: number): ParseNode {
    return { rule, children, start: this.tokens[from].start, end: this.tokens[to - 1].end };
  }
}

export interface GrammarOptions {
  months?: IMonthLookup;
  timezones?: ITimezoneLookup;
}

/**
 * A compiled lexicon plus the rule table. Immutable once built; share one
 * instance across calls.
 */
export class Grammar {
  readonly lexicon: Lexicon;

  constructor(
    readonly months: IMonthLookup,
    readonly timezones: ITimezoneLookup,
    private readonly rules: RuleTable = RULES
  ) {
    this.lexicon = Lexicon.create(months, timezones);
  }

  tokenize(text: string): Token[] {
    return tokenize(text, this.lexicon);
  }

  /** Never fails: text no rule accepts ends up in `unknown` nodes. */
  parse(text: string): ParseNode {
    return new RuleMatcher(this.rules, this.tokenize(text), text).parse();
  }
}

export function createGrammar(options: GrammarOptions = {}): Grammar {
  return new Grammar(options.months ?? new MonthTable(), options.timezones ?? new TimezoneTable());
}

let defaultGrammar: Grammar | undefined;

export function getDefaultGrammar(): Grammar {
  defaultGrammar ??= createGrammar();
  return defaultGrammar;
}
