import { Lexicon } from './lexicon';
import { Token, TokenKind } from './parse-tree';

/**
 * Splits text into tokens, longest match first. A token keeps every terminal
 * kind that matched with the winning length, so "second" is both an ORDINAL
 * and a UNIT and the grammar decides which one applies. A character no
 * terminal accepts becomes a one-character SYMBOL.
 */
export function tokenize(text: string, lexicon: Lexicon): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  while (position < text.length) {
    if (/\s/.test(text[position])) {
      position++;
      continue;
    }

    let length = 0;
    let kinds: TokenKind[] = [];
    for (const terminal of lexicon.terminals) {
      terminal.pattern.lastIndex = position;
      const match = terminal.pattern.exec(text);
      if (!match || match[0].length === 0) continue;
      if (match[0].length > length) {
        length = match[0].length;
        kinds = [terminal.kind];
      } else if (match[0].length === length) {
        kinds.push(terminal.kind);
      }
    }

    if (length === 0) {
      length = 1;
      kinds = ['SYMBOL'];
    }

    const tokenText = text.slice(position, position + length);
    tokens.push({
      kinds,
      text: tokenText,
      value: tokenText.toLowerCase(),
      start: position,
      end: position + length,
    });
    position += length;
  }

  return tokens;
}
