import { Temporal } from '@js-temporal/polyfill';

import {
  DatetimeList,
  DatetimeRange,
  Direction,
  NthWeekday,
  PartialDate,
  PartialDatetime,
  PartialTime,
  RangeEndpoint,
  SemanticValue,
  TextSpan,
  Timedelta,
} from '../entities';
import { guardTemporal as guard, RenderError } from '../errors';
import {
  DateTimeValue,
  isDateTimeValue,
  MatchedResult,
  ParsedValue,
  ParseOutput,
  RangeValue,
  ScalarValue,
  ZonedTime,
} from '../types';
import { daysUntilWeekday, to24Hour } from '../../shared/date-utils';

import { RenderContext } from './render-context';

function nthWeekdayOfMonth(year: number, month: number, { weekday, occurrence }: NthWeekday): Temporal.PlainDate {
  const text = `${year}-${month} weekday ${weekday} #${occurrence}`;
  const first = guard('date', text, () => Temporal.PlainDate.from({ year, month, day: 1 }, { overflow: 'reject' }));

  if (occurrence < 0) {
    const last = first.add({ months: 1 }).subtract({ days: 1 });
    return last.subtract({ days: daysUntilWeekday(weekday, last.dayOfWeek - 1) });
  }

  const result = first.add({ days: daysUntilWeekday(first.dayOfWeek - 1, weekday) + 7 * (occurrence - 1) });
  if (result.month !== month) {
    throw new RenderError('day', text, 'the month has no such occurrence');
  }
  return result;
}

/** Missing year and month come from today; a missing day is the 1st. Never clamps. */
export function renderDate(date: PartialDate, context: RenderContext): Temporal.PlainDate {
  const year = date.year ?? context.today.year;
  const month = date.month ?? context.today.month;
  if (date.nthWeekday) {
    return nthWeekdayOfMonth(year, month, date.nthWeekday);
  }
  const day = date.day ?? 1;
  return guard('date', `${year}-${month}-${day}`, () =>
    Temporal.PlainDate.from({ year, month, day }, { overflow: 'reject' })
  );
}

export function renderTime(time: PartialTime): Temporal.PlainTime {
  const written = time.hour ?? 0;
  const hour = time.clock24 ? written : to24Hour(written, time.meridiem);
  return guard('time', time.toString(), () =>
    Temporal.PlainTime.from(
      { hour, minute: time.minute ?? 0, second: time.second ?? 0, millisecond: time.millisecond ?? 0 },
      { overflow: 'reject' }
    )
  );
}

/** Balanced into days, hours, minutes, seconds and milliseconds. */
export function renderTimedelta(delta: Timedelta): Temporal.Duration {
  const sign = delta.seconds < 0 ? -1 : 1;
  let remaining = Math.round(Math.abs(delta.seconds) * 1000);
  const take = (size: number): number => {
    const amount = Math.floor(remaining / size);
    remaining -= amount * size;
    return amount === 0 ? 0 : sign * amount;
  };
  const days = take(86_400_000);
  const hours = take(3_600_000);
  const minutes = take(60_000);
  const seconds = take(1000);
  const milliseconds = take(1);
  return guard('duration', delta.toString(), () =>
    Temporal.Duration.from({ days, hours, minutes, seconds, milliseconds })
  );
}

function attachZone(value: Temporal.PlainDateTime, timeZone: string | undefined): DateTimeValue {
  if (timeZone === undefined) return value;
  return guard('timezone', timeZone, () => value.toZonedDateTime(timeZone));
}

/** Today at `time`, moved a day forward or back so it lies in the configured direction from now. */
function onNearestDay(time: Temporal.PlainTime, context: RenderContext): Temporal.PlainDateTime {
  const candidate = context.today.toPlainDateTime(time);
  const comparison = Temporal.PlainDateTime.compare(candidate, context.now);
  if (context.config.direction === Direction.next && comparison < 0) return candidate.add({ days: 1 });
  if (context.config.direction === Direction.previous && comparison > 0) return candidate.subtract({ days: 1 });
  return candidate;
}

/**
 * A timezone written in the text wins over the zone of `now`; without either
 * the result is a plain (zone-less) value.
 */
export function renderDatetime(value: PartialDatetime, context: RenderContext): ScalarValue {
  const { date, time } = value;
  const { inferDatetimes } = context.config;
  const timeZone = time?.timezone ?? context.timeZone;

  if (date && time) {
    return attachZone(renderDate(date, context).toPlainDateTime(renderTime(time)), timeZone);
  }
  if (date) {
    const rendered = renderDate(date, context);
    return inferDatetimes ? attachZone(rendered.toPlainDateTime(), timeZone) : rendered;
  }
  if (time) {
    const rendered = renderTime(time);
    if (inferDatetimes) return attachZone(onNearestDay(rendered, context), timeZone);
    return time.timezone ? new ZonedTime(rendered, time.timezone) : rendered;
  }
  throw new RenderError('datetime', value.toString(), 'neither a date nor a time was given');
}

function renderAnchored(delta: Timedelta, context: RenderContext): ScalarValue {
  const { inferDatetimes, anchorDurations } = context.config;
  if (!inferDatetimes || !anchorDurations) return renderTimedelta(delta);
  const anchored = guard('datetime', delta.toString(), () =>
    context.now.add({ milliseconds: Math.round(delta.seconds * 1000) })
  );
  return attachZone(anchored, context.timeZone);
}

function renderEndpoint(endpoint: RangeEndpoint, context: RenderContext): ScalarValue {
  return endpoint instanceof Timedelta ? renderAnchored(endpoint, context) : renderDatetime(endpoint, context);
}

function hasWrittenDate(endpoint: RangeEndpoint): boolean {
  return endpoint instanceof PartialDatetime && endpoint.date !== undefined && !endpoint.date.inferred;
}

function wallClock(value: DateTimeValue): Temporal.PlainDateTime {
  return value instanceof Temporal.ZonedDateTime ? value.toPlainDateTime() : value;
}

function nextDay(value: DateTimeValue): DateTimeValue {
  return value.add({ days: 1 });
}

/**
 * An end that falls before its start without a date of its own is taken to be
 * on the next day. Duration ends are offsets from now and never move.
 */
export function renderRange(range: DatetimeRange, context: RenderContext): RangeValue {
  const start = renderEndpoint(range.start, context);
  let end = renderEndpoint(range.end, context);
  if (
    range.end instanceof PartialDatetime &&
    isDateTimeValue(start) &&
    isDateTimeValue(end) &&
    !hasWrittenDate(range.end) &&
    Temporal.PlainDateTime.compare(wallClock(end), wallClock(start)) < 0
  ) {
    end = nextDay(end);
  }
  return [start, end];
}

export function renderList(list: DatetimeList, context: RenderContext): (ScalarValue | RangeValue)[] {
  return list.values.map((item) => {
    if (item instanceof DatetimeRange) return renderRange(item, context);
    if (item instanceof Timedelta) return renderAnchored(item, context);
    return renderDatetime(item, context);
  });
}

/** Unknown text and integers nothing gave a meaning to render to nothing. */
export function renderValue(value: SemanticValue, context: RenderContext): ParsedValue | undefined {
  if (value instanceof PartialDatetime) return renderDatetime(value, context);
  if (value instanceof DatetimeRange) return renderRange(value, context);
  if (value instanceof DatetimeList) return renderList(value, context);
  if (value instanceof Timedelta) return renderTimedelta(value);
  return undefined;
}

/** Every result as a list, regardless of `returnSingleObject`. */
export function renderResultList(
  values: readonly SemanticValue[],
  text: string,
  context: RenderContext
): readonly ParsedValue[] | readonly MatchedResult[] {
  const rendered: { value: ParsedValue; span: TextSpan }[] = [];
  for (const value of values) {
    const output = renderValue(value, context);
    if (output !== undefined) {
      rendered.push({ value: output, span: value.matchedTextPos ?? [0, text.length] });
    }
  }

  return context.config.returnMatchedText
    ? rendered.map(({ value, span: [start, end] }): MatchedResult => [text.slice(start, end), [start, end], value])
    : rendered.map(({ value }) => value);
}

/**
 * Renders every top-level value and shapes the output as configured:
 * optionally paired with the matched text, optionally unwrapped when there is
 * exactly one.
 */
export function renderResults(values: readonly SemanticValue[], text: string, context: RenderContext): ParseOutput {
  const results = renderResultList(values, text, context);
  if (context.config.returnSingleObject && results.length === 1) return results[0];
  return results;
}
