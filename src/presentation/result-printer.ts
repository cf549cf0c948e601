import { Temporal } from '@js-temporal/polyfill';
import { format, formatDuration } from 'date-fns';

import { isScalarValue, MatchedResult, ParsedValue, ScalarValue, ZonedTime } from '../domain/types';

import { isMatchedResult } from './result-serializer';

/**
 * Display formats
 * Example: "Tue 17 Jul 2018 16:00", "Tue 17 Jul 2018", "16:00"
 */
export const DATETIME_FORMAT = 'EEE dd MMM yyyy HH:mm';
export const DATE_FORMAT = 'EEE dd MMM yyyy';
export const TIME_FORMAT = 'HH:mm';

function toJsDate(date: Temporal.PlainDate, time: Temporal.PlainTime = new Temporal.PlainTime()): Date {
  return new Date(date.year, date.month - 1, date.day, time.hour, time.minute, time.second, time.millisecond);
}

function formatTime(time: Temporal.PlainTime): string {
  const pattern = time.second === 0 ? TIME_FORMAT : `${TIME_FORMAT}:ss`;
  return format(toJsDate(new Temporal.PlainDate(2000, 1, 1), time), pattern);
}

export function formatScalar(value: ScalarValue): string {
  if (value instanceof Temporal.ZonedDateTime) {
    const local = value.toPlainDateTime();
    return `${format(toJsDate(local.toPlainDate(), local.toPlainTime()), DATETIME_FORMAT)} ${value.timeZoneId}`;
  }
  if (value instanceof Temporal.PlainDateTime) {
    return format(toJsDate(value.toPlainDate(), value.toPlainTime()), DATETIME_FORMAT);
  }
  if (value instanceof Temporal.PlainDate) {
    return format(toJsDate(value), DATE_FORMAT);
  }
  if (value instanceof Temporal.PlainTime) {
    return formatTime(value);
  }
  if (value instanceof ZonedTime) {
    return `${formatTime(value.time)} ${value.timeZone}`;
  }
  const length = value.abs();
  const text = formatDuration({
    days: length.days,
    hours: length.hours,
    minutes: length.minutes,
    seconds: length.seconds + length.milliseconds / 1000,
  });
  if (text === '') return '0 seconds';
  return value.sign < 0 ? `minus ${text}` : text;
}

/** Ranges and lists share one array shape, so both print as `[a, b]`. */
export function formatValue(value: ParsedValue): string {
  if (isScalarValue(value)) return formatScalar(value);
  const items: readonly ParsedValue[] = value;
  return `[${items.map(formatValue).join(', ')}]`;
}

function formatItem(item: ParsedValue | MatchedResult): string {
  if (!isMatchedResult(item)) return formatValue(item);
  const [text, [start, end], value] = item;
  return `"${text}" (${start}-${end}): ${formatValue(value)}`;
}

/**
 * One numbered line per result. Expects the list form of the output, as
 * produced without `returnSingleObject`.
 */
export function formatResults(output: readonly ParsedValue[] | readonly MatchedResult[]): string[] {
  const items: readonly (ParsedValue | MatchedResult)[] = output;
  return items.map((item, index) => `${index + 1}. ${formatItem(item)}`);
}

export function printResults(input: string, output: readonly ParsedValue[] | readonly MatchedResult[]): void {
  console.log(`=== ${input} ===`);
  const lines = formatResults(output);
  if (lines.length === 0) {
    console.log('No dates or times found.');
    return;
  }
  lines.forEach((line) => console.log(line));
}
