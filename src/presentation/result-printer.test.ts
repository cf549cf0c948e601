import { Temporal } from '@js-temporal/polyfill';
import { describe, expect, it } from 'vitest';

import { ZonedTime } from '../domain/types';

import { formatResults, formatScalar } from './result-printer';

describe('formatScalar', () => {
  it('formats each kind of value', () => {
    expect(formatScalar(Temporal.PlainDateTime.from('2018-07-17T16:00'))).toBe('Tue 17 Jul 2018 16:00');
    expect(formatScalar(Temporal.PlainDate.from('2018-12-26'))).toBe('Wed 26 Dec 2018');
    expect(formatScalar(Temporal.PlainTime.from('17:00'))).toBe('17:00');
    expect(formatScalar(Temporal.PlainTime.from('17:00:30'))).toBe('17:00:30');
    expect(formatScalar(new ZonedTime(Temporal.PlainTime.from('17:00'), 'America/New_York'))).toBe(
      '17:00 America/New_York'
    );
  });

  it('names the zone of a zoned datetime', () => {
    const value = Temporal.ZonedDateTime.from('2018-08-04T17:00[America/New_York]');
    expect(formatScalar(value)).toBe('Sat 04 Aug 2018 17:00 America/New_York');
  });

  it('spells out durations', () => {
    expect(formatScalar(Temporal.Duration.from({ hours: 1, minutes: 30 }))).toBe('1 hour 30 minutes');
    expect(formatScalar(Temporal.Duration.from({ days: -2 }))).toBe('minus 2 days');
    expect(formatScalar(new Temporal.Duration())).toBe('0 seconds');
    expect(formatScalar(Temporal.Duration.from({ seconds: 1, milliseconds: 500 }))).toBe('1.5 seconds');
  });
});

describe('formatResults', () => {
  it('numbers the results and brackets ranges and lists', () => {
    const start = Temporal.PlainDateTime.from('2018-08-04T15:00');
    const end = Temporal.PlainDateTime.from('2018-08-04T16:00');
    expect(formatResults([[start, end], Temporal.PlainDate.from('2018-08-05')])).toEqual([
      '1. [Sat 04 Aug 2018 15:00, Sat 04 Aug 2018 16:00]',
      '2. Sun 05 Aug 2018',
    ]);
  });

  it('shows where each result was found', () => {
    expect(formatResults([['noon tomorrow', [9, 22], Temporal.PlainDateTime.from('2018-08-05T12:00')]])).toEqual([
      '1. "noon tomorrow" (9-22): Sun 05 Aug 2018 12:00',
    ]);
  });

  it('returns no lines for no results', () => {
    expect(formatResults([])).toEqual([]);
  });
});
