import { Direction } from '../domain/entities/direction';

import { CliConfig, ResolvedParserConfig } from './types';

export const DEFAULT_PARSER_CONFIG: ResolvedParserConfig = {
  inferDatetimes: true,
  direction: Direction.next,
  returnMatchedText: false,
  returnSingleObject: false,
  anchorDurations: true,
};

export const DEFAULT_CLI_CONFIG: Omit<CliConfig, 'now' | 'timezone'> = {
  direction: Direction.next,
  inferDatetimes: true,
  returnMatchedText: false,
  returnSingleObject: false,
  json: false,
  interactive: false,
  writeDebugFiles: false,
  verboseLogging: false,
  text: [],
};
