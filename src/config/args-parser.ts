import { isValid, parseISO } from 'date-fns';

import { isDirection } from '../domain/entities/direction';

import { CliConfig } from './types';

const VALID_OPTIONS = [
  '--config',
  '--now',
  '--timezone',
  '--direction',
  '--infer-datetimes',
  '--matched-text',
  '--single',
  '--json',
  '--interactive',
  '--write-debug-files',
  '--verbose-logging',
];

function parseBoolean(key: string, value: string): boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new Error(`Invalid value for ${key}: "${value}". Must be true or false.`);
}

/**
 * `--key value` pairs plus positional arguments, which are joined into the
 * text to parse. `--config=<file>` is handled by the caller.
 */
export function parseCommandLineArgs(args: string[]): Partial<CliConfig> {
  const config: Partial<CliConfig> = {};
  const text: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const key = args[i];

    // Skip --config=<file> as it's handled separately
    if (key.startsWith('--config=')) continue;

    if (!key.startsWith('--')) {
      text.push(key);
      continue;
    }

    // Check if option is recognized
    if (!VALID_OPTIONS.includes(key)) {
      const validOptionsStr = VALID_OPTIONS.join('\n  ');
      throw new Error(`Unrecognized option '${key}'\n\nValid options:\n  ${validOptionsStr}\n\nSee README.md for usage examples.`);
    }

    const value = args[i + 1];
    if (value === undefined) {
      throw new Error(`Missing value for ${key}`);
    }
    i++;

    switch (key) {
      case '--config':
        break;
      case '--now':
        if (!isValid(parseISO(value))) {
          throw new Error(`Invalid value for --now: "${value}". Must be an ISO 8601 date-time, e.g. 2018-08-04T14:00:00.`);
        }
        config.now = value;
        break;
      case '--timezone':
        config.timezone = value;
        break;
      case '--direction':
        if (!isDirection(value)) {
          throw new Error(`Invalid value for --direction: "${value}". Must be one of: next, previous, this.`);
        }
        config.direction = value;
        break;
      case '--infer-datetimes':
        config.inferDatetimes = parseBoolean(key, value);
        break;
      case '--matched-text':
        config.returnMatchedText = parseBoolean(key, value);
        break;
      case '--single':
        config.returnSingleObject = parseBoolean(key, value);
        break;
      case '--json':
        config.json = parseBoolean(key, value);
        break;
      case '--interactive':
        config.interactive = parseBoolean(key, value);
        break;
      case '--write-debug-files':
        config.writeDebugFiles = parseBoolean(key, value);
        break;
      case '--verbose-logging':
        config.verboseLogging = parseBoolean(key, value);
        break;
    }
  }

  if (text.length > 0) {
    config.text = [text.join(' ')];
  }
  return config;
}
