import { Temporal } from '@js-temporal/polyfill';

import { Direction } from '../domain/entities/direction';

/**
 * Options accepted by `parse`. Every field is optional; see DEFAULT_PARSER_CONFIG.
 */
export interface ParserConfig {
  /** Fill missing dates/times from "now" instead of returning bare dates/times */
  inferDatetimes?: boolean;
  direction?: Direction;
  /** Reference instant; a fresh one is taken on every call when omitted */
  now?: Temporal.PlainDateTime | Temporal.ZonedDateTime;
  returnMatchedText?: boolean;
  returnSingleObject?: boolean;
  /** Render durations inside ranges and lists as offsets from now */
  anchorDurations?: boolean;
}

export type ResolvedParserConfig = Required<Omit<ParserConfig, 'now'>> & Pick<ParserConfig, 'now'>;

/** Settings of the command-line tool (env < YAML < flags) */
export interface CliConfig {
  now?: string;
  timezone?: string;
  direction: Direction;
  inferDatetimes: boolean;
  returnMatchedText: boolean;
  returnSingleObject: boolean;
  json: boolean;
  interactive: boolean;
  writeDebugFiles: boolean;
  verboseLogging: boolean;
  /** Text given as positional arguments */
  text: string[];
}
