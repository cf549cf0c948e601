import { AmbiguousValue } from './ambiguous-value';
import { DatetimeList, DatetimeRange } from './datetime-collection';
import { PartialDatetime } from './partial-datetime';
import { Timedelta } from './timedelta';
import { UnknownText } from './unknown-text';

/** Everything the semantic builder can produce for one top-level expression. */
export type SemanticValue = PartialDatetime | DatetimeRange | DatetimeList | Timedelta | AmbiguousValue | UnknownText;

/** Values the inference engine works on: members of a range or a list. */
export type InferenceItem = PartialDatetime | DatetimeRange | Timedelta | AmbiguousValue;

export type ResolvedItem = Exclude<InferenceItem, AmbiguousValue>;

