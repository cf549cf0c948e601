import { ITimezoneLookup } from '../domain/interfaces';

import timezones from './timezones.json';

const TIMEZONES: Readonly<Record<string, string>> = timezones;

export class TimezoneTable implements ITimezoneLookup {
  constructor(private readonly table: Readonly<Record<string, string>> = TIMEZONES) {}

  resolve(text: string): string | undefined {
    return this.table[text.trim().replace(/\s+/g, ' ')];
  }

  names(): readonly string[] {
    return Object.keys(this.table);
  }
}
