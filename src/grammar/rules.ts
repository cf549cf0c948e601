import { alt, either, exact, integer, many, ofKind, opt, ref, RuleTable, seq, terminal, word } from './expressions';

const ANY = Number.MAX_SAFE_INTEGER;

const slash = terminal(word('/'));
const dash = terminal(word('-'));
const dot = terminal(word('.'));
const colon = terminal(word(':'));
const comma = terminal(word(','));

const month = terminal(integer(1, 12, [1, 2]), 'month');
const day = terminal(integer(1, 31, [1, 2]), 'day');
/** Any two-digit day; values past 31 are turned into years or rejected by the builder */
const looseDay = terminal(integer(1, 99, [1, 2]), 'day');
const year = terminal(integer(0, 9999, [2, 4]), 'year');
const fullYear = terminal(integer(1000, 9999, [4]), 'year');
const dayOrYear = terminal(integer(1, 9999, [1, 2, 4]), 'dayoryear');
const daySuffix = terminal(ofKind('DAYSUFFIX'));

const hour = terminal(integer(0, 24, [1, 2]), 'hour');
const minute = terminal(integer(0, 59, [2]), 'minute');
const second = terminal(integer(0, 59, [2]), 'second');
const millisecond = terminal(integer(0, ANY), 'millisecond');
const meridiem = terminal(ofKind('MERIDIEM'), 'meridiem');
const timezone = terminal(ofKind('TIMEZONE'), 'timezone');

const numberWord = terminal(ofKind('NUMWORD'), 'token');

const listItem = alt(ref('single'), ref('range'), ref('dayrange'));
const listSeparator = alt(seq(comma, opt(terminal(word('or', 'and')))), terminal(word('or', 'and')));

/**
 * The expression grammar. Each rule yields every way it can match at a
 * position; callers pick the longest, and among equally long matches the
 * alternative listed first.
 */
export const RULES: RuleTable = {
  expression: alt(ref('single'), ref('range'), ref('list'), ref('dayrange')),

  range: alt(
    seq(ref('single'), terminal(word('to', '-', 'through', 'thru', 'until', 'till')), ref('single')),
    seq(terminal(word('from')), ref('single'), terminal(word('to', '-', 'until', 'till')), ref('single')),
    seq(terminal(word('between')), ref('single'), terminal(word('and')), ref('single'))
  ),

  list: seq(listItem, many(seq(listSeparator, listItem), 1)),

  single: alt(ref('datetime'), ref('duration'), ref('relative'), ref('ambiguous')),

  relative: alt(
    seq(terminal(word('in')), ref('duration')),
    seq(ref('duration'), terminal(word('ago'), 'token')),
    seq(ref('duration'), terminal(word('from')), terminal(word('now'))),
    seq(ref('duration'), terminal(word('later')))
  ),

  ambiguous: terminal(integer(0, ANY), 'token'),

  datetime: alt(
    seq(ref('date'), opt(terminal(either(word('at', ','), exact('T')))), alt(ref('time'), hour)),
    seq(ref('time'), opt(terminal(word('on', ','))), ref('date')),
    seq(ref('date'), timezone),
    ref('datetimename'),
    ref('date'),
    ref('time')
  ),

  date: alt(
    seq(month, slash, looseDay, opt(slash, year)),
    seq(month, dash, looseDay, opt(dash, year)),
    seq(month, dot, day, dot, year),
    seq(fullYear, dash, month, dash, day),
    seq(ref('monthname'), looseDay, opt(daySuffix), opt(comma), year),
    seq(ref('monthname'), day, daySuffix),
    seq(ref('monthname'), dayOrYear),
    seq(opt(terminal(word('the'))), day, opt(daySuffix), opt(terminal(word('of'))), ref('monthname'), opt(opt(comma), year)),
    seq(terminal(word('the')), day, daySuffix),
    ref('nthweekday'),
    ref('weekday'),
    ref('datename')
  ),

  weekday: seq(many(terminal(ofKind('MODIFIER'), 'token')), terminal(ofKind('WEEKDAY'), 'token')),

  nthweekday: seq(
    alt(terminal(ofKind('ORDINAL'), 'token'), seq(terminal(integer(1, 5, [1]), 'token'), daySuffix)),
    terminal(ofKind('WEEKDAY'), 'token'),
    terminal(word('of')),
    ref('monthname'),
    opt(opt(comma), year)
  ),

  dayrange: seq(many(terminal(ofKind('MODIFIER'), 'token')), terminal(ofKind('DAYRANGE'), 'token')),

  datename: terminal(ofKind('DATENAME'), 'token'),
  datetimename: terminal(ofKind('DATETIMENAME'), 'token'),
  monthname: terminal(ofKind('MONTHNAME'), 'token'),

  time: alt(
    seq(hour, colon, minute, opt(colon, second, opt(dot, millisecond)), opt(meridiem), opt(timezone)),
    seq(hour, meridiem, opt(timezone)),
    seq(hour, terminal(word("o'clock", 'oclock')), opt(meridiem), opt(timezone)),
    seq(hour, terminal(word('in')), terminal(word('the')), ref('timename')),
    seq(opt(terminal(word('this', 'the'))), ref('timename'), opt(timezone))
  ),

  timename: terminal(ofKind('TIMENAME'), 'token'),

  duration: seq(ref('durationpart'), many(seq(opt(opt(comma), terminal(word('and'))), ref('durationpart')))),

  durationpart: seq(
    alt(
      seq(terminal(integer(0, ANY), 'token'), opt(dot, terminal(integer(0, ANY), 'token'))),
      seq(numberWord, many(seq(opt(dash), numberWord))),
      terminal(word('a', 'an'), 'token')
    ),
    terminal(ofKind('UNIT'), 'token')
  ),
};
