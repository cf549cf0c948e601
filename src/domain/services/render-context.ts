import { Temporal } from '@js-temporal/polyfill';

import { ResolvedParserConfig } from '../../config/types';

/**
 * Everything a single parse call needs to know about "now". Built fresh per
 * call so an omitted `now` is never reused between calls.
 */
export interface RenderContext {
  readonly config: ResolvedParserConfig;
  /** Wall-clock now */
  readonly now: Temporal.PlainDateTime;
  readonly today: Temporal.PlainDate;
  /** Zone of `config.now` when it was a ZonedDateTime */
  readonly timeZone?: string;
}

export type Clock = () => Temporal.PlainDateTime;

const systemClock: Clock = () => Temporal.Now.plainDateTimeISO();

export function createRenderContext(config: ResolvedParserConfig, clock: Clock = systemClock): RenderContext {
  const reference = config.now;
  if (reference instanceof Temporal.ZonedDateTime) {
    const now = reference.toPlainDateTime();
    return { config, now, today: now.toPlainDate(), timeZone: reference.timeZoneId };
  }
  const now = reference ?? clock();
  return { config, now, today: now.toPlainDate() };
}
