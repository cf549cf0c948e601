import { Meridiem } from '../domain/entities/meridiem';

/**
 * Two-digit years: 50-99 are the 1900s, 0-49 the 2000s.
 * Example: 18 → 2018, 69 → 1969, 1999 → 1999
 */
export function expandYear(year: number): number {
  if (year >= 0 && year < 50) return 2000 + year;
  if (year >= 50 && year < 100) return 1900 + year;
  return year;
}

// 12 AM is midnight, 12 PM is noon
export function to24Hour(hour: number, meridiem?: Meridiem): number {
  if (meridiem === Meridiem.PM) return hour === 12 ? 12 : hour + 12;
  if (meridiem === Meridiem.AM) return hour === 12 ? 0 : hour;
  return hour;
}

/** Days from `fromWeekday` forward to `toWeekday`, both Monday-based (0..6). */
export function daysUntilWeekday(fromWeekday: number, toWeekday: number): number {
  return (((toWeekday - fromWeekday) % 7) + 7) % 7;
}
