import {
  DATE_NAMES,
  DAY_RANGES,
  DATETIME_NAMES,
  KEYWORDS,
  MODIFIER_WEEKS,
  NUMBER_WORDS,
  ORDINALS,
  TIME_NAMES,
  UNIT_ALIASES,
  WEEKDAYS,
} from '../domain/constants';
import { IMonthLookup, ITimezoneLookup } from '../domain/interfaces';

import { TokenKind } from './parse-tree';

export interface Terminal {
  readonly kind: TokenKind;
  /** Sticky pattern; the tokenizer sets `lastIndex` before each attempt */
  readonly pattern: RegExp;
  /** Breaks ties between terminals matching the same length */
  readonly priority: number;
}

const WORD_START = '(?<![A-Za-z])';
const WORD_END = '(?![A-Za-z])';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function wordTerminal(
  kind: TokenKind,
  words: readonly string[],
  priority: number,
  options: { caseSensitive?: boolean; suffix?: string } = {}
): Terminal {
  const alternatives = [...words]
    .sort((a, b) => b.length - a.length)
    .map((word) => escapeRegExp(word).replace(/ /g, '\\s+'));
  const source = `${WORD_START}(?:${alternatives.join('|')})${options.suffix ?? ''}${WORD_END}`;
  return { kind, priority, pattern: new RegExp(source, options.caseSensitive ? 'y' : 'iy') };
}

/**
 * The compiled set of terminals. Built once per grammar and shared by every
 * tokenize call.
 */
export class Lexicon {
  readonly terminals: readonly Terminal[];

  private constructor(terminals: Terminal[]) {
    this.terminals = [...terminals].sort((a, b) => b.priority - a.priority);
  }

  static create(months: IMonthLookup, timezones: ITimezoneLookup): Lexicon {
    return new Lexicon([
      { kind: 'DAYSUFFIX', priority: 95, pattern: /(?<=\d)(?:st|nd|rd|th)(?![A-Za-z])/iy },
      { kind: 'MERIDIEM', priority: 90, pattern: /(?<![A-Za-z])(?:[ap]\.?m\.?|[ap])(?![A-Za-z])/iy },
      wordTerminal('MONTHNAME', months.names(), 85, { suffix: '\\.?' }),
      wordTerminal('WEEKDAY', Object.keys(WEEKDAYS), 85),
      wordTerminal('DATENAME', Object.keys(DATE_NAMES), 80),
      wordTerminal('DATETIMENAME', Object.keys(DATETIME_NAMES), 80),
      wordTerminal('TIMENAME', Object.keys(TIME_NAMES), 80),
      wordTerminal('ORDINAL', Object.keys(ORDINALS), 75),
      wordTerminal('MODIFIER', Object.keys(MODIFIER_WEEKS), 74),
      wordTerminal('DAYRANGE', Object.keys(DAY_RANGES), 72),
      wordTerminal('UNIT', Object.keys(UNIT_ALIASES), 70),
      wordTerminal('NUMWORD', Object.keys(NUMBER_WORDS), 70),
      wordTerminal('KEYWORD', KEYWORDS, 65),
      wordTerminal('TIMEZONE', timezones.names(), 60, { caseSensitive: true }),
      { kind: 'INT', priority: 50, pattern: /\d+/y },
      { kind: 'PUNCT', priority: 40, pattern: /[\/:,.\-']/y },
      { kind: 'WORD', priority: 10, pattern: /(?<![A-Za-z])[A-Za-z]+/y },
    ]);
  }
}
