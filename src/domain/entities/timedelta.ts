import { Matchable } from './matchable';

export type DurationUnit = 'second' | 'minute' | 'hour' | 'day' | 'week' | 'month' | 'year';

/** Length of each unit in seconds; months and years are fixed approximations. */
export const UNIT_SECONDS: Record<DurationUnit, number> = {
  second: 1,
  minute: 60,
  hour: 3600,
  day: 86400,
  week: 7 * 86400,
  month: 30 * 86400,
  year: 365 * 86400,
};

/**
 * A signed amount of time. `unit` records how the amount was written, so an
 * ambiguous neighbour ("30-40 mins") can be read in the same unit.
 */
export class Timedelta extends Matchable {
  constructor(
    readonly seconds: number,
    readonly unit: DurationUnit
  ) {
    super();
  }

  static of(quantity: number, unit: DurationUnit): Timedelta {
    return new Timedelta(quantity * UNIT_SECONDS[unit], unit);
  }

  plus(other: Timedelta): Timedelta {
    return new Timedelta(this.seconds + other.seconds, other.unit);
  }

  toString(): string {
    return `${this.seconds / UNIT_SECONDS[this.unit]} ${this.unit}(s)`;
  }
}
