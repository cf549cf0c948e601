import { Temporal } from '@js-temporal/polyfill';
import { describe, expect, it } from 'vitest';

import { ZonedTime } from '../domain/types';

import { isMatchedResult, serializeOutput, serializeValue } from './result-serializer';

describe('serializeValue', () => {
  it('writes scalars as ISO 8601 strings', () => {
    expect(serializeValue(Temporal.PlainDate.from('2018-08-04'))).toBe('2018-08-04');
    expect(serializeValue(Temporal.Duration.from({ minutes: 90 }))).toBe('PT90M');
    expect(serializeValue(new ZonedTime(Temporal.PlainTime.from('09:15'), 'Asia/Tokyo'))).toBe('09:15:00[Asia/Tokyo]');
  });

  it('keeps the nesting of ranges inside lists', () => {
    const day = Temporal.PlainDate.from('2018-08-04');
    const range = [Temporal.PlainTime.from('15:00'), Temporal.PlainTime.from('16:00')] as const;
    expect(serializeValue([day, range])).toEqual(['2018-08-04', ['15:00:00', '16:00:00']]);
  });
});

describe('serializeOutput', () => {
  it('turns matched results into objects', () => {
    const output = [['noon', [0, 4], Temporal.PlainTime.from('12:00')]] as const;
    expect(serializeOutput(output)).toEqual([{ text: 'noon', start: 0, end: 4, value: '12:00:00' }]);
  });

  it('serializes a single unwrapped value', () => {
    expect(serializeOutput(Temporal.PlainDate.from('2018-08-04'))).toBe('2018-08-04');
    expect(serializeOutput(['noon', [0, 4], Temporal.PlainTime.from('12:00')])).toEqual({
      text: 'noon',
      start: 0,
      end: 4,
      value: '12:00:00',
    });
  });

  it('tells matched results from plain values', () => {
    expect(isMatchedResult(['noon', [0, 4], Temporal.PlainTime.from('12:00')])).toBe(true);
    expect(isMatchedResult([Temporal.PlainTime.from('12:00'), Temporal.PlainTime.from('13:00')])).toBe(false);
  });
});
