/**
 * Domain-level vocabulary
 * Word tables shared by the lexicon (which words exist) and the semantic
 * builder (what they mean)
 */

import type { DurationUnit } from './entities/timedelta';
import { Meridiem } from './entities/meridiem';

export const NUMBER_WORDS: Readonly<Record<string, number>> = {
  zero: 0,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
  twenty: 20,
  thirty: 30,
  forty: 40,
  fifty: 50,
  sixty: 60,
  seventy: 70,
  eighty: 80,
  ninety: 90,
  an: 1,
};

export const UNIT_ALIASES: Readonly<Record<string, DurationUnit>> = {
  second: 'second',
  seconds: 'second',
  sec: 'second',
  secs: 'second',
  s: 'second',
  minute: 'minute',
  minutes: 'minute',
  min: 'minute',
  mins: 'minute',
  m: 'minute',
  hour: 'hour',
  hours: 'hour',
  hr: 'hour',
  hrs: 'hour',
  h: 'hour',
  day: 'day',
  days: 'day',
  d: 'day',
  week: 'week',
  weeks: 'week',
  wk: 'week',
  wks: 'week',
  w: 'week',
  month: 'month',
  months: 'month',
  mo: 'month',
  mos: 'month',
  year: 'year',
  years: 'year',
  yr: 'year',
  yrs: 'year',
  y: 'year',
};

/** Monday is 0 */
export const WEEKDAYS: Readonly<Record<string, number>> = {
  monday: 0,
  mon: 0,
  tuesday: 1,
  tues: 1,
  tue: 1,
  wednesday: 2,
  wed: 2,
  thursday: 3,
  thurs: 3,
  thur: 3,
  thu: 3,
  friday: 4,
  fri: 4,
  saturday: 5,
  sat: 5,
  sunday: 6,
  sun: 6,
};

export const ORDINALS: Readonly<Record<string, number>> = {
  first: 1,
  second: 2,
  third: 3,
  fourth: 4,
  fifth: 5,
  last: -1,
};

/** Day offset from today */
export const DATE_NAMES: Readonly<Record<string, number>> = {
  today: 0,
  tomorrow: 1,
  tmw: 1,
  tmrw: 1,
  yesterday: -1,
};

export interface NamedTime {
  hour: number;
  meridiem: Meridiem;
}

export const TIME_NAMES: Readonly<Record<string, NamedTime>> = {
  noon: { hour: 12, meridiem: Meridiem.PM },
  midday: { hour: 12, meridiem: Meridiem.PM },
  midnight: { hour: 12, meridiem: Meridiem.AM },
  morning: { hour: 6, meridiem: Meridiem.AM },
  afternoon: { hour: 3, meridiem: Meridiem.PM },
  evening: { hour: 6, meridiem: Meridiem.PM },
  night: { hour: 8, meridiem: Meridiem.PM },
};

export const DATETIME_NAMES: Readonly<Record<string, NamedTime & { days: number }>> = {
  tonight: { days: 0, hour: 8, meridiem: Meridiem.PM },
};

/** Weeks each modifier adds to a weekday reference */
export const MODIFIER_WEEKS: Readonly<Record<string, number>> = {
  next: 1,
  previous: -1,
  prev: -1,
  last: -1,
  past: -1,
  preceding: -1,
  this: 0,
  upcoming: 0,
  following: 0,
};

/** A run of days from a weekday (Monday is 0), or a whole calendar month */
export type NamedDayRange = { startWeekday: number; days: number } | { calendarMonth: true };

/** Named spans of days, resolved from the weekday they start on */
export const DAY_RANGES: Readonly<Record<string, NamedDayRange>> = {
  weekend: { startWeekday: 5, days: 2 },
  weekdays: { startWeekday: 0, days: 5 },
  week: { startWeekday: 0, days: 7 },
  month: { calendarMonth: true },
};

/** Modifiers that pick the upcoming occurrence regardless of the configured direction */
export const UPCOMING_MODIFIERS: readonly string[] = ['upcoming', 'following'];

export const KEYWORDS: readonly string[] = [
  'to',
  'or',
  'and',
  'at',
  'on',
  'of',
  'the',
  'in',
  'ago',
  'from',
  'now',
  'through',
  'thru',
  'until',
  'till',
  'between',
  'later',
  "o'clock",
  'oclock',
];
