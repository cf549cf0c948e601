import { Temporal } from '@js-temporal/polyfill';

import { GrammarError } from '../errors';

/**
 * "The nth <weekday> of the month", applied after year and month are known.
 * `weekday` is 0 for Monday through 6 for Sunday; `occurrence` is 1..5, or -1
 * for the last one.
 */
export interface NthWeekday {
  weekday: number;
  occurrence: number;
}

export interface PartialDateInit {
  year?: number;
  month?: number;
  day?: number;
  nthWeekday?: NthWeekday;
  inferred?: boolean;
}

/**
 * A calendar date with any of its fields possibly missing. Missing fields are
 * filled from "now" when the date is rendered.
 */
export class PartialDate {
  year?: number;
  month?: number;
  day?: number;
  nthWeekday?: NthWeekday;
  /** Set when the whole date was borrowed from a neighbouring value. */
  inferred: boolean;

  constructor(init: PartialDateInit = {}) {
    if (init.day !== undefined && (init.day < 1 || init.day > 31)) {
      throw new GrammarError('date', String(init.day), 'day must be between 1 and 31');
    }
    if (init.month !== undefined && (init.month < 1 || init.month > 12)) {
      throw new GrammarError('date', String(init.month), 'month must be between 1 and 12');
    }
    this.year = init.year;
    this.month = init.month;
    this.day = init.day;
    this.nthWeekday = init.nthWeekday ? { ...init.nthWeekday } : undefined;
    this.inferred = init.inferred ?? false;
  }

  static fromPlainDate(date: Temporal.PlainDate): PartialDate {
    return new PartialDate({ year: date.year, month: date.month, day: date.day });
  }

  clone(overrides: Partial<PartialDateInit> = {}): PartialDate {
    return new PartialDate({
      year: this.year,
      month: this.month,
      day: this.day,
      nthWeekday: this.nthWeekday,
      inferred: this.inferred,
      ...overrides,
    });
  }

  toString(): string {
    const parts = [this.month ?? '?', this.day ?? '?', this.year ?? '?'];
    const nth = this.nthWeekday ? ` (weekday ${this.nthWeekday.weekday} #${this.nthWeekday.occurrence})` : '';
    return `${parts.join('/')}${nth}`;
  }
}
