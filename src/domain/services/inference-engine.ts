import {
  AmbiguousValue,
  DatelikeValue,
  InferenceItem,
  PartialDate,
  PartialDatetime,
  PartialTime,
  ResolvedItem,
  Timedelta,
} from '../entities';
import { InferenceError } from '../errors';
import { DatelikeField } from '../interfaces';
import { expandYear } from '../../shared/date-utils';

/** Fields shared between members of a range or list, in copy order */
const INFERRED_FIELDS: readonly DatelikeField[] = ['date', 'time', 'month', 'year', 'meridiem', 'timezone'];

/**
 * Copies one field from `source` to `target` when the target lacks it. Dates
 * and times are cloned; a borrowed date is flagged as inferred.
 */
function borrowField(source: DatelikeValue, target: DatelikeValue, field: DatelikeField): void {
  switch (field) {
    case 'date': {
      const date = source.get('date');
      if (date && !target.get('date')) target.set('date', date.clone({ inferred: true }));
      return;
    }
    case 'time': {
      const time = source.get('time');
      if (time && !target.get('time')) target.set('time', time.clone());
      return;
    }
    default: {
      const value = source.get(field);
      if (value !== undefined && target.get(field) === undefined) target.set(field, value);
    }
  }
}

function copyFields(source: DatelikeValue, target: DatelikeValue): void {
  for (const field of INFERRED_FIELDS) {
    borrowField(source, target, field);
  }
}

/**
 * Gives a bare integer the type its neighbour suggests: a quantity of the
 * neighbour's unit, an hour when the neighbour has a time, otherwise the first
 * of day, month or year the neighbour carries and the integer fits.
 */
function reinterpret(ambiguous: AmbiguousValue, source: Exclude<InferenceItem, AmbiguousValue>): ResolvedItem | undefined {
  const { value } = ambiguous;
  let result: ResolvedItem | undefined;

  if (source instanceof Timedelta) {
    result = Timedelta.of(value, source.unit);
  } else if (source.get('time')) {
    result = new PartialDatetime(
      undefined,
      new PartialTime({ hour: value, meridiem: source.get('meridiem'), clock24: value === 0 || value > 12 })
    );
  } else if (source.get('day') !== undefined && value >= 1 && value <= 31) {
    result = new PartialDatetime(new PartialDate({ day: value }));
  } else if (source.get('month') !== undefined && value >= 1 && value <= 12) {
    result = new PartialDatetime(new PartialDate({ month: value }));
  } else if (source.get('year') !== undefined) {
    result = new PartialDatetime(new PartialDate({ year: expandYear(value) }));
  }

  if (result && ambiguous.matchedTextPos) result.withSpan(ambiguous.matchedTextPos);
  return result;
}

function inferPair(source: InferenceItem, target: InferenceItem): InferenceItem {
  if (source instanceof AmbiguousValue) return target;

  let resolved: ResolvedItem;
  if (target instanceof AmbiguousValue) {
    const reinterpreted = reinterpret(target, source);
    if (!reinterpreted) return target;
    resolved = reinterpreted;
  } else {
    resolved = target;
  }

  if (source instanceof DatelikeValue && resolved instanceof DatelikeValue) {
    copyFields(source, resolved);
  }
  return resolved;
}

function nearestResolved(items: readonly InferenceItem[], index: number): ResolvedItem | undefined {
  for (let distance = 1; distance < items.length; distance++) {
    for (const candidate of [items[index - distance], items[index + distance]]) {
      if (candidate !== undefined && !(candidate instanceof AmbiguousValue)) return candidate;
    }
  }
  return undefined;
}

function resolveItem(items: readonly InferenceItem[], index: number): ResolvedItem {
  const item = items[index];
  if (!(item instanceof AmbiguousValue)) return item;

  const neighbour = nearestResolved(items, index);
  const reinterpreted = neighbour ? inferPair(neighbour, item) : item;
  if (reinterpreted instanceof AmbiguousValue) {
    throw new InferenceError(String(item.value), 'no neighbouring value carries a date, time or duration');
  }
  return reinterpreted;
}

/**
 * Shares missing fields between the members of a range or list: the first
 * member fills in the others, then the last member does. Bare integers take
 * their type from the values around them.
 *
 * @example
 * "7/17 4 or 5 PM" → [7/17 4 PM, 7/17 5 PM]
 */
export function inferFromContext(items: readonly InferenceItem[]): ResolvedItem[] {
  const values = [...items];
  const last = values.length - 1;

  if (values.length > 1) {
    for (let i = 1; i < values.length; i++) {
      values[i] = inferPair(values[0], values[i]);
    }
    for (let i = 0; i < last; i++) {
      values[i] = inferPair(values[last], values[i]);
    }
  }

  return values.map((_, index) => resolveItem(values, index));
}
