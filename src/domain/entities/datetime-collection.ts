import type { DatelikeFieldSetters, DatelikeFieldValues } from '../interfaces/datelike.interface';

import { DatelikeValue } from './datelike-value';
import { PartialDatetime } from './partial-datetime';
import { Timedelta } from './timedelta';

/**
 * Shared accessors for ranges and lists: a read returns the first item that
 * has the field, a write goes to every item. Dates and times are cloned per
 * item so no two items share an object.
 */
export abstract class DatetimeCollection<Item extends DatelikeValue | Timedelta> extends DatelikeValue {
  abstract get items(): readonly Item[];

  private datelikeItems(): DatelikeValue[] {
    const result: DatelikeValue[] = [];
    for (const item of this.items) {
      if (item instanceof DatelikeValue) result.push(item);
    }
    return result;
  }

  protected fieldValues(): DatelikeFieldValues {
    const items = this.datelikeItems();
    return {
      date: items.map((item) => item.get('date')).find((value) => value !== undefined),
      time: items.map((item) => item.get('time')).find((value) => value !== undefined),
      year: items.map((item) => item.get('year')).find((value) => value !== undefined),
      month: items.map((item) => item.get('month')).find((value) => value !== undefined),
      day: items.map((item) => item.get('day')).find((value) => value !== undefined),
      meridiem: items.map((item) => item.get('meridiem')).find((value) => value !== undefined),
      timezone: items.map((item) => item.get('timezone')).find((value) => value !== undefined),
    };
  }

  protected fieldSetters(): DatelikeFieldSetters {
    const items = this.datelikeItems();
    return {
      date: (value) => items.forEach((item) => item.set('date', value.clone())),
      time: (value) => items.forEach((item) => item.set('time', value.clone())),
      year: (value) => items.forEach((item) => item.set('year', value)),
      month: (value) => items.forEach((item) => item.set('month', value)),
      day: (value) => items.forEach((item) => item.set('day', value)),
      meridiem: (value) => items.forEach((item) => item.set('meridiem', value)),
      timezone: (value) => items.forEach((item) => item.set('timezone', value)),
    };
  }
}

export type RangeEndpoint = PartialDatetime | Timedelta;

export class DatetimeRange extends DatetimeCollection<RangeEndpoint> {
  constructor(
    public start: RangeEndpoint,
    public end: RangeEndpoint
  ) {
    super();
  }

  get items(): readonly RangeEndpoint[] {
    return [this.start, this.end];
  }

  toString(): string {
    return `${this.start.toString()} - ${this.end.toString()}`;
  }
}

export type ListItem = PartialDatetime | Timedelta | DatetimeRange;

export class DatetimeList extends DatetimeCollection<ListItem> {
  constructor(readonly values: ListItem[]) {
    super();
  }

  get items(): readonly ListItem[] {
    return this.values;
  }

  toString(): string {
    return `[${this.values.map((value) => value.toString()).join(', ')}]`;
  }
}
