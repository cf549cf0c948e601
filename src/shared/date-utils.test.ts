import { describe, expect, it } from 'vitest';

import { Meridiem } from '../domain/entities/meridiem';

import { daysUntilWeekday, expandYear, to24Hour } from './date-utils';

describe('expandYear', () => {
  it('puts 0-49 in the 2000s', () => {
    expect(expandYear(0)).toBe(2000);
    expect(expandYear(18)).toBe(2018);
    expect(expandYear(49)).toBe(2049);
  });

  it('puts 50-99 in the 1900s', () => {
    expect(expandYear(50)).toBe(1950);
    expect(expandYear(99)).toBe(1999);
  });

  it('leaves full years alone', () => {
    expect(expandYear(1999)).toBe(1999);
    expect(expandYear(2018)).toBe(2018);
  });
});

describe('to24Hour', () => {
  it('adds 12 to afternoon hours', () => {
    expect(to24Hour(1, Meridiem.PM)).toBe(13);
    expect(to24Hour(11, Meridiem.PM)).toBe(23);
  });

  it('treats 12 PM as noon and 12 AM as midnight', () => {
    expect(to24Hour(12, Meridiem.PM)).toBe(12);
    expect(to24Hour(12, Meridiem.AM)).toBe(0);
  });

  it('keeps morning hours and hours without a meridiem', () => {
    expect(to24Hour(7, Meridiem.AM)).toBe(7);
    expect(to24Hour(7)).toBe(7);
  });
});

describe('daysUntilWeekday', () => {
  it('counts forward and wraps around the week', () => {
    // Saturday (5) to Monday (0)
    expect(daysUntilWeekday(5, 0)).toBe(2);
    expect(daysUntilWeekday(0, 5)).toBe(5);
    expect(daysUntilWeekday(3, 3)).toBe(0);
  });
});
