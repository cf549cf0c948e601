/**
 * Half of the 12-hour clock a time was written in.
 */
export enum Meridiem {
  AM = 'AM',
  PM = 'PM',
}

/** Accepts "a", "am", "a.m.", "p", "PM", ... */
export function parseMeridiem(text: string): Meridiem {
  return text.trim().toLowerCase().startsWith('p') ? Meridiem.PM : Meridiem.AM;
}
