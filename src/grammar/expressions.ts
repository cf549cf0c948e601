import { GrammarRule, hasKind, LeafRule, Token, TokenKind } from './parse-tree';

export type TokenTest = (token: Token) => boolean;

/**
 * What a matched terminal leaves in the tree: nothing (separators and
 * keywords), the bare token, or a one-token node named after a rule.
 */
export type Capture = LeafRule | 'token';

export type Expr =
  | { readonly type: 'terminal'; readonly test: TokenTest; readonly capture?: Capture }
  | { readonly type: 'ref'; readonly rule: GrammarRule }
  | { readonly type: 'seq'; readonly items: readonly Expr[] }
  | { readonly type: 'alt'; readonly options: readonly Expr[] }
  | { readonly type: 'opt'; readonly item: Expr }
  | { readonly type: 'many'; readonly item: Expr; readonly min: number };

export type RuleTable = { readonly [R in GrammarRule]: Expr };

export const terminal = (test: TokenTest, capture?: Capture): Expr => ({ type: 'terminal', test, capture });

export const ref = (rule: GrammarRule): Expr => ({ type: 'ref', rule });

export const seq = (...items: Expr[]): Expr => ({ type: 'seq', items });

/** Alternatives in priority order */
export const alt = (...options: Expr[]): Expr => ({ type: 'alt', options });

export const opt = (...items: Expr[]): Expr => ({ type: 'opt', item: items.length === 1 ? items[0] : seq(...items) });

export const many = (item: Expr, min = 0): Expr => ({ type: 'many', item, min });

export const ofKind =
  (kind: TokenKind): TokenTest =>
  (token) =>
    hasKind(token, kind);

/** Matches on the lower-cased token text, whatever terminal produced it */
export const word =
  (...values: string[]): TokenTest =>
  (token) =>
    values.includes(token.value);

export const exact =
  (text: string): TokenTest =>
  (token) =>
    token.text === text;

export const either =
  (...tests: TokenTest[]): TokenTest =>
  (token) =>
    tests.some((test) => test(token));

/** An INT token within `[min, max]`, optionally restricted to some digit counts */
export const integer =
  (min: number, max: number, digits?: readonly number[]): TokenTest =>
  (token) => {
    if (!hasKind(token, 'INT')) return false;
    if (digits && !digits.includes(token.text.length)) return false;
    const value = Number(token.text);
    return value >= min && value <= max;
  };
