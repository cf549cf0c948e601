import { Temporal } from '@js-temporal/polyfill';

import { Meridiem } from './meridiem';

export interface PartialTimeInit {
  hour?: number;
  minute?: number;
  second?: number;
  millisecond?: number;
  meridiem?: Meridiem;
  timezone?: string;
  clock24?: boolean;
}

/**
 * A time of day with any of its fields possibly missing.
 *
 * Hours written on a 12-hour clock stay in 1..12 until rendering so that a
 * meridiem borrowed later ("3-4 pm") can still apply. Hours written on a
 * 24-hour clock are flagged `clock24`; those ignore any meridiem.
 */
export class PartialTime {
  hour?: number;
  minute?: number;
  second?: number;
  millisecond?: number;
  meridiem?: Meridiem;
  /** IANA time zone id */
  timezone?: string;
  clock24: boolean;

  constructor(init: PartialTimeInit = {}) {
    this.hour = init.hour;
    this.minute = init.minute;
    this.second = init.second;
    this.millisecond = init.millisecond;
    this.clock24 = init.clock24 ?? false;
    this.meridiem = this.clock24 ? undefined : init.meridiem;
    this.timezone = init.timezone;
  }

  static fromPlainTime(time: Temporal.PlainTime, timezone?: string): PartialTime {
    return new PartialTime({
      hour: time.hour,
      minute: time.minute,
      second: time.second,
      millisecond: time.millisecond,
      timezone,
      clock24: true,
    });
  }

  clone(overrides: Partial<PartialTimeInit> = {}): PartialTime {
    return new PartialTime({
      hour: this.hour,
      minute: this.minute,
      second: this.second,
      millisecond: this.millisecond,
      meridiem: this.meridiem,
      timezone: this.timezone,
      clock24: this.clock24,
      ...overrides,
    });
  }

  toString(): string {
    const clock = `${this.hour ?? '?'}:${String(this.minute ?? 0).padStart(2, '0')}`;
    return [clock, this.meridiem, this.timezone].filter((part) => part !== undefined).join(' ');
  }
}
