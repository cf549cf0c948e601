import { Temporal } from '@js-temporal/polyfill';

import {
  DATE_NAMES,
  DATETIME_NAMES,
  DAY_RANGES,
  MODIFIER_WEEKS,
  NUMBER_WORDS,
  ORDINALS,
  TIME_NAMES,
  UNIT_ALIASES,
  UPCOMING_MODIFIERS,
  WEEKDAYS,
} from '../constants';
import {
  AmbiguousValue,
  DatetimeList,
  DatetimeRange,
  Direction,
  InferenceItem,
  Matchable,
  parseMeridiem,
  PartialDate,
  PartialDatetime,
  PartialTime,
  RangeEndpoint,
  ResolvedItem,
  SemanticValue,
  Timedelta,
  UnknownText,
} from '../entities';
import { GrammarError, guardTemporal } from '../errors';
import { IMonthLookup, ITimezoneLookup } from '../interfaces';
import { hasKind, isParseNode, ParseNode, Token } from '../../grammar/parse-tree';
import { daysUntilWeekday, expandYear } from '../../shared/date-utils';

import { FieldSet, mergeFieldSets } from './field-set';
import { inferFromContext } from './inference-engine';
import { RenderContext } from './render-context';

type Built = FieldSet | SemanticValue | Token;

function isToken(value: Built): value is Token {
  return !(value instanceof Matchable) && 'kinds' in value;
}

function isFieldSet(value: Built): value is FieldSet {
  return !(value instanceof Matchable) && !('kinds' in value);
}

function isSemantic(value: Built): value is SemanticValue {
  return value instanceof Matchable;
}

export interface BuilderLookups {
  readonly months: IMonthLookup;
  readonly timezones: ITimezoneLookup;
}

/**
 * Resolves "[modifiers] <weekday>" to a date. The base occurrence follows the
 * direction (next: 0..6 days ahead, previous: 0..6 days back, this: within
 * three days either way); each "next" adds a week and each "last" removes one.
 */
export function resolveWeekday(
  weekday: number,
  modifiers: readonly string[],
  direction: Direction,
  today: Temporal.PlainDate
): Temporal.PlainDate {
  let base = direction;
  let weeks = 0;
  for (const modifier of modifiers) {
    weeks += MODIFIER_WEEKS[modifier] ?? 0;
    if (UPCOMING_MODIFIERS.includes(modifier)) base = Direction.next;
  }

  const ahead = daysUntilWeekday(today.dayOfWeek - 1, weekday);
  let offset = ahead;
  if (base === Direction.previous) {
    offset = ahead === 0 ? 0 : ahead - 7;
  } else if (base === Direction.this) {
    offset = ahead > 3 ? ahead - 7 : ahead;
  }
  return today.add({ days: offset + 7 * weeks });
}

/**
 * Turns a parse tree into semantic values, bottom-up. Inner rules produce
 * field sets that their parents merge; datetime, duration, range and list
 * rules produce values. Ranges and lists run through the inference engine
 * before they are wrapped.
 */
export class SemanticBuilder {
  constructor(
    private readonly lookups: BuilderLookups,
    private readonly context: RenderContext
  ) {}

  build(tree: ParseNode, text: string): SemanticValue[] {
    return tree.children.filter(isParseNode).map((node) => {
      const span = [node.start, node.end] as const;
      if (node.rule === 'unknown') {
        return new UnknownText(text.slice(node.start, node.end)).withSpan(span);
      }
      return this.valueOf(node, text).withSpan(span);
    });
  }

  private valueOf(node: ParseNode, text: string): SemanticValue {
    const built = this.visit(node, text);
    if (!isSemantic(built)) {
      throw new GrammarError(node.rule, text.slice(node.start, node.end), 'expected a date, time or duration');
    }
    return built;
  }

  private visit(node: ParseNode, text: string): Built {
    const children = node.children.map((child) => (isParseNode(child) ? this.visit(child, text) : child));
    const raw = text.slice(node.start, node.end);
    const fields = mergeFieldSets(...children.filter(isFieldSet));
    const tokens = children.filter(isToken);
    const values = children.filter(isSemantic);

    switch (node.rule) {
      case 'month':
        return { month: this.integer(tokens) };
      case 'day':
        return { day: this.integer(tokens) };
      case 'year':
        return { year: expandYear(this.integer(tokens)) };
      case 'dayoryear': {
        const value = this.integer(tokens);
        return value < 32 ? { day: value } : { year: expandYear(value) };
      }
      case 'hour': {
        const hour = this.integer(tokens);
        const leadingZero = tokens[0].text.length === 2 && tokens[0].text.startsWith('0');
        return { hour, clock24: leadingZero || hour === 0 || hour > 12 };
      }
      case 'minute':
        return { minute: this.integer(tokens) };
      case 'second':
        return { second: this.integer(tokens) };
      case 'millisecond':
        return { millisecond: Math.round(Number(`0.${tokens[0].text}`) * 1000) };
      case 'meridiem':
        return { meridiem: parseMeridiem(tokens[0].text) };
      case 'timezone':
        return { timezone: this.timezone(tokens[0]) };
      case 'monthname':
        return { month: this.lookups.months.resolve(tokens[0].text) ?? this.context.today.month };
      case 'datename':
        return { date: PartialDate.fromPlainDate(this.context.today.add({ days: DATE_NAMES[tokens[0].value] ?? 0 })) };
      case 'datetimename':
        return this.datetimeName(tokens[0]);
      case 'timename':
        return { time: this.timeName(tokens[0]) };
      case 'weekday':
        return this.weekday(tokens);
      case 'dayrange':
        return this.dayRange(tokens, raw);
      case 'nthweekday':
        return this.nthWeekday(tokens, fields, raw);
      case 'date':
        return this.date(fields);
      case 'time':
        return { time: this.time(fields, raw) };
      case 'datetime':
        return this.datetime(fields);
      case 'durationpart':
        return this.durationPart(tokens, raw);
      case 'duration':
        return this.duration(values, raw);
      case 'relative':
        return this.relative(values, tokens, raw);
      case 'ambiguous':
        return new AmbiguousValue(this.integer(tokens));
      case 'single':
      case 'expression':
        return this.only(values, node.rule, raw);
      case 'range':
        return this.range(values, raw);
      case 'list':
        return new DatetimeList(inferFromContext(values.map((value) => this.inferenceItem(value, raw))));
      case 'start':
      case 'unknown':
        throw new GrammarError(node.rule, raw, 'unexpected nested node');
    }
  }

  private integer(tokens: readonly Token[]): number {
    return Number(tokens[0].text);
  }

  private timezone(token: Token): string {
    const timezone = this.lookups.timezones.resolve(token.text);
    if (timezone === undefined) {
      throw new GrammarError('timezone', token.text, 'unknown timezone');
    }
    return timezone;
  }

  private timeName(token: Token): PartialTime {
    const named = TIME_NAMES[token.value];
    if (!named) throw new GrammarError('timename', token.text);
    return new PartialTime({ hour: named.hour, meridiem: named.meridiem });
  }

  private datetimeName(token: Token): FieldSet {
    const named = DATETIME_NAMES[token.value];
    if (!named) throw new GrammarError('datetimename', token.text);
    return {
      date: PartialDate.fromPlainDate(this.context.today.add({ days: named.days })),
      time: new PartialTime({ hour: named.hour, meridiem: named.meridiem }),
    };
  }

  private weekday(tokens: readonly Token[]): FieldSet {
    const name = tokens[tokens.length - 1];
    const weekday = WEEKDAYS[name.value];
    if (weekday === undefined) throw new GrammarError('weekday', name.text);
    const modifiers = tokens.slice(0, -1).map((token) => token.value);
    const date = resolveWeekday(weekday, modifiers, this.context.config.direction, this.context.today);
    return { date: PartialDate.fromPlainDate(date) };
  }

  private dayRange(tokens: readonly Token[], raw: string): DatetimeRange {
    const name = tokens[tokens.length - 1];
    const named = DAY_RANGES[name.value];
    if (named === undefined) throw new GrammarError('dayrange', raw);
    const modifiers = tokens.slice(0, -1).map((token) => token.value);

    let start: Temporal.PlainDate;
    let end: Temporal.PlainDate;
    if ('calendarMonth' in named) {
      // a bare "month" is the next calendar month
      const shift = modifiers.reduce((sum, modifier) => sum + (MODIFIER_WEEKS[modifier] ?? 0), 0);
      const months = modifiers.length === 0 ? 1 : shift;
      start = this.context.today.with({ day: 1 }).add({ months });
      end = start.add({ months: 1 }).subtract({ days: 1 });
    } else {
      start = resolveWeekday(named.startWeekday, modifiers, this.context.config.direction, this.context.today);
      end = start.add({ days: named.days - 1 });
    }
    return new DatetimeRange(
      new PartialDatetime(PartialDate.fromPlainDate(start)),
      new PartialDatetime(PartialDate.fromPlainDate(end))
    );
  }

  private nthWeekday(tokens: readonly Token[], fields: FieldSet, raw: string): FieldSet {
    const [position, name] = tokens;
    const occurrence = hasKind(position, 'ORDINAL') ? ORDINALS[position.value] : Number(position.text);
    const weekday = WEEKDAYS[name.value];
    if (occurrence === undefined || weekday === undefined) throw new GrammarError('nthweekday', raw);
    return {
      date: new PartialDate({ year: fields.year, month: fields.month, nthWeekday: { weekday, occurrence } }),
    };
  }

  private date(fields: FieldSet): FieldSet {
    let { year, day } = fields;
    const { month } = fields;
    if (fields.date && year === undefined && month === undefined && day === undefined) {
      return { date: fields.date };
    }
    if (day !== undefined && day > 31) {
      if (year !== undefined) {
        throw new GrammarError('date', String(day), 'day is past 31 and a year is already given');
      }
      year = expandYear(day);
      day = undefined;
    }
    return { date: new PartialDate({ year, month, day }) };
  }

  private time(fields: FieldSet, raw: string): PartialTime {
    const { hour, meridiem } = fields;

    if (fields.time) {
      // "5 in the afternoon" keeps the hour and borrows the meridiem
      if (hour !== undefined) {
        if (hour > 12) throw new GrammarError('time', raw, 'a 24-hour clock hour cannot take a time of day');
        return new PartialTime({ hour, meridiem: fields.time.meridiem });
      }
      return fields.timezone ? fields.time.clone({ timezone: fields.timezone }) : fields.time;
    }

    if (meridiem !== undefined && hour !== undefined && hour > 12) {
      throw new GrammarError('time', raw, 'a 24-hour clock hour cannot take am/pm');
    }
    return new PartialTime({
      hour,
      minute: fields.minute,
      second: fields.second,
      millisecond: fields.millisecond,
      meridiem,
      timezone: fields.timezone,
      clock24: fields.clock24 === true && (meridiem === undefined || hour === 0),
    });
  }

  private datetime(fields: FieldSet): PartialDatetime {
    let { time } = fields;
    if (!time && fields.hour !== undefined) {
      time = new PartialTime({ hour: fields.hour, clock24: fields.clock24 });
    } else if (!time && fields.timezone !== undefined) {
      time = new PartialTime({ timezone: fields.timezone });
    }
    return new PartialDatetime(fields.date, time);
  }

  private durationPart(tokens: readonly Token[], raw: string): Timedelta {
    const unitToken = tokens[tokens.length - 1];
    const unit = UNIT_ALIASES[unitToken.value];
    if (unit === undefined) throw new GrammarError('durationpart', raw, 'unknown unit');

    const amountTokens = tokens.slice(0, -1);
    let quantity: number;
    if (hasKind(amountTokens[0], 'INT')) {
      quantity = Number(amountTokens.map((token) => token.text).join('.'));
    } else if (amountTokens[0].value === 'a') {
      quantity = 1;
    } else {
      quantity = amountTokens.reduce((sum, token) => sum + (NUMBER_WORDS[token.value] ?? 0), 0);
    }
    return Timedelta.of(quantity, unit);
  }

  private duration(values: readonly SemanticValue[], raw: string): Timedelta {
    const parts = values.filter((value): value is Timedelta => value instanceof Timedelta);
    if (parts.length === 0) throw new GrammarError('duration', raw);
    return parts.slice(1).reduce((total, part) => total.plus(part), parts[0]);
  }

  private relative(values: readonly SemanticValue[], tokens: readonly Token[], raw: string): PartialDatetime {
    const delta = this.duration(values, raw);
    const sign = tokens.some((token) => token.value === 'ago') ? -1 : 1;
    const instant = guardTemporal('datetime', raw, () =>
      this.context.now.add({ milliseconds: Math.round(sign * delta.seconds * 1000) })
    );
    return new PartialDatetime(
      PartialDate.fromPlainDate(instant.toPlainDate()),
      PartialTime.fromPlainTime(instant.toPlainTime())
    );
  }

  private only(values: readonly SemanticValue[], rule: string, raw: string): SemanticValue {
    if (values.length !== 1) throw new GrammarError(rule, raw, `expected one value, got ${values.length}`);
    return values[0];
  }

  private inferenceItem(value: SemanticValue, raw: string): InferenceItem {
    if (value instanceof UnknownText || value instanceof DatetimeList) {
      throw new GrammarError('list', raw, 'ranges and lists hold dates, times and durations only');
    }
    return value;
  }

  private range(values: readonly SemanticValue[], raw: string): DatetimeRange {
    if (values.length !== 2) throw new GrammarError('range', raw, `expected two endpoints, got ${values.length}`);
    const [start, end] = inferFromContext(values.map((value) => this.inferenceItem(value, raw))).map((item) =>
      this.endpoint(item, raw)
    );
    return new DatetimeRange(start, end);
  }

  private endpoint(item: ResolvedItem, raw: string): RangeEndpoint {
    if (item instanceof DatetimeRange) throw new GrammarError('range', raw, 'a range cannot contain a range');
    return item;
  }
}
