/**
 * Which occurrence of an under-specified weekday or time to pick
 *
 * - next: the upcoming occurrence (today counts)
 * - previous: the most recent occurrence (today counts)
 * - this: whichever occurrence is closest to today
 */
export enum Direction {
  next = 'next',
  previous = 'previous',
  this = 'this',
}

export function isDirection(value: string): value is Direction {
  return value === Direction.next || value === Direction.previous || value === Direction.this;
}
