import { Meridiem, PartialDate, PartialTime } from '../entities';

/**
 * Loose fields produced by leaf and intermediate grammar rules before they are
 * assembled into a PartialDate or PartialTime
 */
export interface FieldSet {
  date?: PartialDate;
  time?: PartialTime;
  year?: number;
  month?: number;
  day?: number;
  hour?: number;
  minute?: number;
  second?: number;
  millisecond?: number;
  meridiem?: Meridiem;
  timezone?: string;
  /** The hour was written on a 24-hour clock */
  clock24?: boolean;
}

const FIELD_KEYS: readonly (keyof FieldSet)[] = [
  'date',
  'time',
  'year',
  'month',
  'day',
  'hour',
  'minute',
  'second',
  'millisecond',
  'meridiem',
  'timezone',
  'clock24',
];

function copyMissing<K extends keyof FieldSet>(target: FieldSet, source: FieldSet, key: K): void {
  if (target[key] === undefined && source[key] !== undefined) {
    target[key] = source[key];
  }
}

/** Combines field sets left to right; the first defined value of each field wins. */
export function mergeFieldSets(...sets: readonly FieldSet[]): FieldSet {
  const merged: FieldSet = {};
  for (const set of sets) {
    for (const key of FIELD_KEYS) {
      copyMissing(merged, set, key);
    }
  }
  return merged;
}
