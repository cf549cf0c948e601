import { Temporal } from '@js-temporal/polyfill';
import { describe, expect, it } from 'vitest';

import { getDefaultGrammar } from '../../grammar';
import { contextAt } from '../../test-support/context';
import { DatetimeRange, Direction, Meridiem, PartialDatetime, Timedelta, UnknownText } from '../entities';
import { GrammarError, RenderError } from '../errors';

import { resolveWeekday, SemanticBuilder } from './semantic-builder';

const SATURDAY = Temporal.PlainDate.from('2018-08-04');
const MONDAY = 0;
const WEDNESDAY = 2;
const SATURDAY_INDEX = 5;

function dateOf(weekday: number, modifiers: string[], direction: Direction): string {
  return resolveWeekday(weekday, modifiers, direction, SATURDAY).toString();
}

describe('resolveWeekday', () => {
  it('picks the upcoming occurrence by default, today included', () => {
    expect(dateOf(MONDAY, [], Direction.next)).toBe('2018-08-06');
    expect(dateOf(SATURDAY_INDEX, [], Direction.next)).toBe('2018-08-04');
  });

  it('looks back with the previous direction', () => {
    expect(dateOf(MONDAY, [], Direction.previous)).toBe('2018-07-30');
  });

  it('picks the nearest occurrence with the this direction', () => {
    expect(dateOf(MONDAY, [], Direction.this)).toBe('2018-08-06');
    expect(dateOf(WEDNESDAY, [], Direction.this)).toBe('2018-08-01');
  });

  it('moves a week per modifier', () => {
    expect(dateOf(SATURDAY_INDEX, ['next'], Direction.next)).toBe('2018-08-11');
    expect(dateOf(WEDNESDAY, ['last'], Direction.next)).toBe('2018-08-01');
    expect(dateOf(MONDAY, ['next', 'next'], Direction.next)).toBe('2018-08-13');
  });

  it('always looks ahead for "upcoming"', () => {
    expect(dateOf(WEDNESDAY, ['upcoming'], Direction.previous)).toBe('2018-08-08');
  });
});

describe('SemanticBuilder', () => {
  const grammar = getDefaultGrammar();

  function build(text: string) {
    return new SemanticBuilder(grammar, contextAt()).build(grammar.parse(text), text);
  }

  function single(text: string): PartialDatetime {
    const [value] = build(text);
    if (!(value instanceof PartialDatetime)) throw new Error(`expected a datetime from "${text}"`);
    return value;
  }

  it('keeps a 12-hour clock hour relative until rendering', () => {
    const value = single('5p');
    expect(value.time?.hour).toBe(5);
    expect(value.time?.meridiem).toBe(Meridiem.PM);
    expect(value.time?.clock24).toBe(false);
    expect(value.matchedTextPos).toEqual([0, 2]);
  });

  it('flags hours written on a 24-hour clock', () => {
    expect(single('09:00').time?.clock24).toBe(true);
    expect(single('17:45').time).toMatchObject({ hour: 17, minute: 45, clock24: true });
  });

  it('passes unmatched text through as unknown values', () => {
    const values = build('how does 5p sound?');
    expect(values.map((value) => value instanceof UnknownText)).toEqual([true, false, true]);
    expect(values[0]).toMatchObject({ text: 'how does' });
    expect(values.map((value) => value.matchedTextPos)).toEqual([
      [0, 8],
      [9, 11],
      [12, 18],
    ]);
  });

  it('builds month names, days and years into one date', () => {
    expect(single('July 17th, 2018').date).toMatchObject({ year: 2018, month: 7, day: 17 });
    expect(single('March 2018').date).toMatchObject({ year: 2018, month: 3, day: undefined });
  });

  it('resolves named days and times against now', () => {
    expect(single('tomorrow').date).toMatchObject({ year: 2018, month: 8, day: 5 });
    const tonight = single('tonight');
    expect(tonight.date).toMatchObject({ year: 2018, month: 8, day: 4 });
    expect(tonight.time).toMatchObject({ hour: 8, meridiem: Meridiem.PM });
  });

  it('borrows the meridiem of a time of day', () => {
    expect(single('5 in the afternoon').time).toMatchObject({ hour: 5, meridiem: Meridiem.PM });
  });

  it('turns relative durations into absolute datetimes', () => {
    const value = single('2h30m ago');
    expect(value.date).toMatchObject({ year: 2018, month: 8, day: 4 });
    expect(value.time).toMatchObject({ hour: 11, minute: 30, second: 0, clock24: true });
  });

  it('rejects a meridiem after a 24-hour clock hour', () => {
    expect(() => build('17:30 pm')).toThrow(GrammarError);
  });

  it('rejects a day past 31 next to a year', () => {
    expect(() => build('March 45, 2018')).toThrow(GrammarError);
    expect(() => build('7/45/18')).toThrow(GrammarError);
  });

  it('reads a numeric day past 31 as the year', () => {
    expect(single('7/32').date).toMatchObject({ year: 2032, month: 7, day: undefined });
    expect(single('12-45').date).toMatchObject({ year: 2045, month: 12, day: undefined });
  });

  it('adds spelled-out numbers in a duration', () => {
    const [thirtyTwo] = build('thirty two minutes');
    const [twentyFive] = build('twenty-five mins');
    expect(thirtyTwo).toBeInstanceOf(Timedelta);
    expect(thirtyTwo).toMatchObject({ seconds: 1920, unit: 'minute' });
    expect(twentyFive).toMatchObject({ seconds: 1500, unit: 'minute' });
  });

  it('reports a relative offset past the calendar as a RenderError', () => {
    expect(() => build('in 999999999 years')).toThrow(RenderError);
  });

  describe('named day ranges', () => {
    function days(text: string): string[] {
      const [value] = build(text);
      if (!(value instanceof DatetimeRange)) throw new Error(`expected a range from "${text}"`);
      return value.items.map((item) =>
        item instanceof PartialDatetime && item.date ? `${item.date.year}-${item.date.month}-${item.date.day}` : 'none'
      );
    }

    it('starts a weekend on the upcoming Saturday', () => {
      expect(days('weekend')).toEqual(['2018-8-4', '2018-8-5']);
      expect(days('next weekend')).toEqual(['2018-8-11', '2018-8-12']);
      expect(days('last weekend')).toEqual(['2018-7-28', '2018-7-29']);
    });

    it('spans Monday to Friday for weekdays and Monday to Sunday for a week', () => {
      expect(days('weekdays')).toEqual(['2018-8-6', '2018-8-10']);
      expect(days('week')).toEqual(['2018-8-6', '2018-8-12']);
      expect(days('last week')).toEqual(['2018-7-30', '2018-8-5']);
    });

    it('covers a calendar month, the next one when no modifier is given', () => {
      expect(days('month')).toEqual(['2018-9-1', '2018-9-30']);
      expect(days('this month')).toEqual(['2018-8-1', '2018-8-31']);
      expect(days('last month')).toEqual(['2018-7-1', '2018-7-31']);
    });
  });
});
