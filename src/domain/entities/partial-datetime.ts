import type { DatelikeFieldSetters, DatelikeFieldValues } from '../interfaces/datelike.interface';

import { DatelikeValue } from './datelike-value';
import { PartialDate } from './partial-date';
import { PartialTime } from './partial-time';

/**
 * A date, a time, or both. Year/month/day read through to the date and
 * meridiem/timezone to the time; writing one of them when its owner is
 * missing does nothing.
 */
export class PartialDatetime extends DatelikeValue {
  constructor(
    public date?: PartialDate,
    public time?: PartialTime
  ) {
    super();
  }

  protected fieldValues(): DatelikeFieldValues {
    const { date, time } = this;
    return {
      date,
      time,
      year: date?.year,
      month: date?.month,
      day: date?.day,
      meridiem: time && !time.clock24 ? time.meridiem : undefined,
      timezone: time?.timezone,
    };
  }

  protected fieldSetters(): DatelikeFieldSetters {
    return {
      date: (value) => {
        this.date = value;
      },
      time: (value) => {
        this.time = value;
      },
      year: (value) => {
        if (this.date) this.date.year = value;
      },
      month: (value) => {
        if (this.date) this.date.month = value;
      },
      day: (value) => {
        if (this.date) this.date.day = value;
      },
      meridiem: (value) => {
        if (this.time && !this.time.clock24) this.time.meridiem = value;
      },
      timezone: (value) => {
        if (this.time) this.time.timezone = value;
      },
    };
  }

  toString(): string {
    return [this.date?.toString(), this.time?.toString()].filter(Boolean).join(' ');
  }
}
