import { IMonthLookup } from '../domain/interfaces';

const MONTHS = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

function buildMonthNames(): Record<string, number> {
  const names: Record<string, number> = {};
  MONTHS.forEach((month, index) => {
    names[month] = index + 1;
    names[month.slice(0, 3)] = index + 1;
  });
  names.sept = 9;
  return names;
}

export class MonthTable implements IMonthLookup {
  private readonly table = buildMonthNames();

  /** Case-insensitive; a trailing dot ("Aug.") is ignored. */
  resolve(text: string): number | undefined {
    return this.table[text.trim().toLowerCase().replace(/\.$/, '')];
  }

  names(): readonly string[] {
    return Object.keys(this.table);
  }
}
