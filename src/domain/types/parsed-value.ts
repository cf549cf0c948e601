import { Temporal } from '@js-temporal/polyfill';

import { ZonedTime } from './zoned-time';

export type DateTimeValue = Temporal.PlainDateTime | Temporal.ZonedDateTime;

export type ScalarValue =
  | Temporal.PlainDateTime
  | Temporal.ZonedDateTime
  | Temporal.PlainDate
  | Temporal.PlainTime
  | ZonedTime
  | Temporal.Duration;

export type RangeValue = readonly [start: ScalarValue, end: ScalarValue];

export type ParsedValue = ScalarValue | RangeValue | readonly (ScalarValue | RangeValue)[];

/** `[matched text, [start, end], value]` */
export type MatchedResult = readonly [text: string, span: readonly [number, number], value: ParsedValue];

export type ParseOutput = ParsedValue | readonly ParsedValue[] | readonly MatchedResult[] | MatchedResult;

export function isScalarValue(value: ParsedValue): value is ScalarValue {
  return !Array.isArray(value);
}

export function isDateTimeValue(value: ParsedValue): value is DateTimeValue {
  return value instanceof Temporal.PlainDateTime || value instanceof Temporal.ZonedDateTime;
}
