import { describe, expect, it } from 'vitest';

import { MonthTable, TimezoneTable } from '../data';

import { Lexicon } from './lexicon';
import { tokenize } from './tokenizer';

const lexicon = Lexicon.create(new MonthTable(), new TimezoneTable());

function texts(text: string): string[] {
  return tokenize(text, lexicon).map((token) => token.text);
}

describe('tokenize', () => {
  it('splits digits, punctuation and words', () => {
    expect(texts('7/17 4 or 5 PM')).toEqual(['7', '/', '17', '4', 'or', '5', 'PM']);
  });

  it('splits letters glued to numbers', () => {
    expect(texts('2h30m ago')).toEqual(['2', 'h', '30', 'm', 'ago']);
    expect(texts('5p')).toEqual(['5', 'p']);
  });

  it('prefers the longest match', () => {
    expect(texts('Wednesday')).toEqual(['Wednesday']);
    expect(texts('p.m.')).toEqual(['p.m.']);
  });

  it('keeps every kind matching the same span, highest priority first', () => {
    const [second] = tokenize('second', lexicon);
    expect(second.kinds).toEqual(['ORDINAL', 'UNIT', 'WORD']);

    const [last] = tokenize('last', lexicon);
    expect(last.kinds).toEqual(['ORDINAL', 'MODIFIER', 'WORD']);

    const [, week] = tokenize('next week', lexicon);
    expect(week.kinds).toEqual(['DAYRANGE', 'UNIT', 'WORD']);
  });

  it('recognises day suffixes only after digits', () => {
    const tokens = tokenize('17th', lexicon);
    expect(tokens.map((token) => token.kinds[0])).toEqual(['INT', 'DAYSUFFIX']);
  });

  it('matches timezone abbreviations case-sensitively', () => {
    expect(tokenize('EST', lexicon)[0].kinds[0]).toBe('TIMEZONE');
    expect(tokenize('est', lexicon)[0].kinds).toEqual(['WORD']);
  });

  it('records offsets and the lower-cased value', () => {
    const tokens = tokenize('  Next Monday', lexicon);
    expect(tokens[0]).toMatchObject({ text: 'Next', value: 'next', start: 2, end: 6 });
    expect(tokens[1]).toMatchObject({ text: 'Monday', value: 'monday', start: 7, end: 13 });
  });

  it('turns characters no terminal accepts into symbols', () => {
    expect(tokenize('5p?', lexicon).map((token) => token.kinds)).toEqual([['INT'], ['MERIDIEM', 'WORD'], ['SYMBOL']]);
  });

  it('returns nothing for blank text', () => {
    expect(tokenize('   ', lexicon)).toEqual([]);
  });
});
