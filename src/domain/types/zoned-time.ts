import { Temporal } from '@js-temporal/polyfill';

/**
 * A wall-clock time pinned to a time zone but not to a date ("5pm EST" with
 * date inference turned off). Temporal has no such type.
 */
export class ZonedTime {
  constructor(
    readonly time: Temporal.PlainTime,
    readonly timeZone: string
  ) {}

  toString(): string {
    return `${this.time.toString()}[${this.timeZone}]`;
  }

  toJSON(): string {
    return this.toString();
  }
}
