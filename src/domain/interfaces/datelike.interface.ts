import type { Meridiem } from '../entities/meridiem';
import type { PartialDate } from '../entities/partial-date';
import type { PartialTime } from '../entities/partial-time';

/**
 * The fields that can be read from, and copied between, datelike values
 */
export interface DatelikeFields {
  date: PartialDate;
  time: PartialTime;
  year: number;
  month: number;
  day: number;
  meridiem: Meridiem;
  timezone: string;
}

export type DatelikeField = keyof DatelikeFields;

export type DatelikeFieldValues = { [F in DatelikeField]?: DatelikeFields[F] };

export type DatelikeFieldSetters = { [F in DatelikeField]: (value: DatelikeFields[F]) => void };

/**
 * Interface for values that carry calendar fields
 * This lets the inference engine move fields around without knowing whether it
 * is talking to a single datetime, a range or a list
 */
export interface Datelike {
  get<F extends DatelikeField>(field: F): DatelikeFields[F] | undefined;
  set<F extends DatelikeField>(field: F, value: DatelikeFields[F]): void;
}
