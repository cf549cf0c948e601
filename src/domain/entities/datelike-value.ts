import type {
  Datelike,
  DatelikeField,
  DatelikeFields,
  DatelikeFieldSetters,
  DatelikeFieldValues,
} from '../interfaces/datelike.interface';

import { Matchable } from './matchable';

/**
 * Base for semantic values exposing the {@link Datelike} accessors. Subclasses
 * describe their fields once as a snapshot of values and a table of setters.
 */
export abstract class DatelikeValue extends Matchable implements Datelike {
  protected abstract fieldValues(): DatelikeFieldValues;

  protected abstract fieldSetters(): DatelikeFieldSetters;

  get<F extends DatelikeField>(field: F): DatelikeFields[F] | undefined {
    return this.fieldValues()[field];
  }

  set<F extends DatelikeField>(field: F, value: DatelikeFields[F]): void {
    const setters: DatelikeFieldSetters = this.fieldSetters();
    const setter: (value: DatelikeFields[F]) => void = setters[field];
    setter(value);
  }
}
